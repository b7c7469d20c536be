import { describe, expect, it } from 'vitest';
import {
  cellText,
  formatFullName,
  formatPersonLink,
  HttpError,
  isValidUuid,
  parseApiErrorEnvelope,
  stripQuotes,
  urlJoin,
  wrapError,
  ConnectorError,
} from '../src/index.js';

describe('string helpers', () => {
  it('strips one pair of matching quotes after trimming', () => {
    expect(stripQuotes(' "12345" ')).toBe('12345');
    expect(stripQuotes("'abc'")).toBe('abc');
    expect(stripQuotes('"mixed\'')).toBe('"mixed\'');
    expect(stripQuotes('""nested""')).toBe('"nested"');
    expect(stripQuotes('"')).toBe('"');
  });

  it('maps empty or missing query cells to null', () => {
    expect(cellText(null)).toBeNull();
    expect(cellText(undefined)).toBeNull();
    expect(cellText('""')).toBeNull();
    expect(cellText(42)).toBe('42');
    expect(cellText('"+41 61 000 00 00"')).toBe('+41 61 000 00 00');
  });

  it('joins url parts without doubled slashes', () => {
    expect(urlJoin('https://catalog.example/', '/rest/', 'prod', 'persons/')).toBe(
      'https://catalog.example/rest/prod/persons'
    );
  });

  it('formats names', () => {
    expect(formatFullName({ givenName: 'Anna', additionalName: 'Maria', familyName: 'Muster' })).toBe(
      'Anna Maria Muster'
    );
    expect(formatFullName({ givenName: 'Anna', additionalName: null, familyName: 'Muster' })).toBe(
      'Anna Muster'
    );
    expect(formatPersonLink({ givenName: ' Anna ', familyName: 'Muster' })).toBe('Muster, Anna');
  });

  it('accepts only canonical lowercase UUIDs', () => {
    expect(isValidUuid('0f8fad5b-d9cb-469f-a165-70867728950e')).toBe(true);
    expect(isValidUuid('0F8FAD5B-D9CB-469F-A165-70867728950E')).toBe(false);
    expect(isValidUuid('{0f8fad5b-d9cb-469f-a165-70867728950e}')).toBe(false);
    expect(isValidUuid('not-a-uuid')).toBe(false);
  });
});

describe('HttpError', () => {
  it('parses the error envelope', () => {
    const envelope = parseApiErrorEnvelope(
      JSON.stringify({
        message: 'Validation failed',
        violations: [{ message: 'label is required' }, 'code is too long'],
        errors: ['conflict'],
      })
    );
    expect(envelope).toEqual({
      message: 'Validation failed',
      violations: ['label is required', 'code is too long'],
      errors: ['conflict'],
    });
  });

  it('returns null for bodies without an envelope', () => {
    expect(parseApiErrorEnvelope('<html>bad gateway</html>')).toBeNull();
    expect(parseApiErrorEnvelope('{"other":1}')).toBeNull();
  });

  it('builds the message from envelope parts', () => {
    const error = new HttpError({
      status: 400,
      statusText: 'Bad Request',
      method: 'PATCH',
      url: 'https://catalog.example/rest/prod/persons/1',
      envelope: { message: 'Validation failed', violations: ['a', 'b'], errors: ['c'] },
    });
    expect(error.message).toBe('Validation failed Violations: a; b Errors: c');
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.status).toBe(400);
    expect(error).toBeInstanceOf(ConnectorError);
  });

  it('falls back to status line without envelope', () => {
    const error = new HttpError({
      status: 502,
      statusText: 'Bad Gateway',
      method: 'GET',
      url: 'https://catalog.example/x',
      envelope: null,
    });
    expect(error.message).toBe('502 Server Error: Bad Gateway for url: https://catalog.example/x');
    expect(error.code).toBe('HTTP_ERROR');
  });

  it('maps 404 and 410 to NOT_FOUND', () => {
    for (const status of [404, 410]) {
      const error = new HttpError({ status, statusText: 'Gone', method: 'GET', url: 'u', envelope: null });
      expect(error.code).toBe('NOT_FOUND');
    }
  });

  it('wraps foreign errors but keeps connector errors', () => {
    const original = new ConnectorError({ code: 'TIMEOUT', message: 'slow' });
    expect(wrapError(original)).toBe(original);
    const wrapped = wrapError(new Error('boom'), 'catalog', 'READ_FAILED');
    expect(wrapped.code).toBe('READ_FAILED');
    expect(wrapped.source).toBe('catalog');
    expect(wrapped.toActionableMessage()).toBe('Error [READ_FAILED]: boom\nSource: catalog');
  });

  it('fills in service-specific suggestions and the request line', () => {
    const error = new HttpError({
      status: 401,
      statusText: 'Unauthorized',
      method: 'GET',
      url: 'https://directory.example/api/people/7',
      envelope: null,
      source: 'directory',
    });

    expect(error.code).toBe('AUTHENTICATION_FAILED');
    expect(error.toActionableMessage()).toBe(
      [
        'Error [AUTHENTICATION_FAILED]: 401 Client Error: Unauthorized for url: https://directory.example/api/people/7',
        'Source: directory',
        'Request: GET https://directory.example/api/people/7 (401)',
        'Suggested action: Check directory.accessKey.',
      ].join('\n')
    );

    const explicit = new ConnectorError({ code: 'RATE_LIMITED', message: 'slow down', source: 'catalog', suggestion: 'Wait.' });
    expect(explicit.suggestion).toBe('Wait.');
    expect(new ConnectorError({ code: 'RATE_LIMITED', message: 'm', source: 'catalog' }).suggestion).toBe(
      'Increase http.rateLimitDelayMs.'
    );
  });

  it('marks timeouts, dropped connections and HTTP errors as transient', () => {
    expect(new ConnectorError({ code: 'TIMEOUT', message: 't' }).transient).toBe(true);
    expect(new ConnectorError({ code: 'CONNECTION_FAILED', message: 'c' }).transient).toBe(true);
    expect(new ConnectorError({ code: 'WRITE_FAILED', message: 'w' }).transient).toBe(false);
    const notFound = new HttpError({ status: 404, statusText: 'Not Found', method: 'GET', url: 'u', envelope: null });
    expect(notFound.code).toBe('NOT_FOUND');
    expect(notFound.transient).toBe(true);
    expect(notFound.toJSON()).toMatchObject({ code: 'NOT_FOUND', transient: true, status: 404 });
  });
});
