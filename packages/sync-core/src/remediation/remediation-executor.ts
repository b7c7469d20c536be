/**
 * Remediation Executor
 *
 * Idempotent "ensure" operations against the catalog. Each one reads the
 * current value first and writes only on a difference, so a second run with the
 * same inputs is a no-op. Failures are returned, never thrown. Persons and
 * users are never deleted.
 */

import { randomUUID } from 'node:crypto';
import {
  blankToNull,
  errorMessage,
  personNameKey,
  silentLogger,
  type AccessLevel,
  type CatalogPerson,
  type CatalogUser,
  type ICatalogGateway,
  type Logger,
  type NewPerson,
  type NewUser,
  type PersonName,
} from '@catalogsync/core';
import type { AuditTrail, RemediationOperation } from '../audit/index.js';
import type { PersonLookupCache } from '../cache/index.js';
import { diffContactProperties } from '../diff/index.js';
import { SyncError } from '../errors/index.js';
import { CONTACT_FIELDS, type ContactDifference, type ContactProperties } from '../types/index.js';
import { PERSON_ID_PROPERTY } from '../state/index.js';

export type RemediationResult<T> =
  | { status: 'applied'; value: T }
  | { status: 'unchanged'; value: T }
  | { status: 'failed'; error: string };

export interface RemediationExecutorOptions {
  gateway: ICatalogGateway;
  /** Invalidated after every person mutation */
  lookups?: PersonLookupCache;
  audit?: AuditTrail;
  logger?: Logger;
  /** Report writes as applied without performing them */
  dryRun?: boolean;
}

export interface AccessLevelChange {
  userId: string;
  from: AccessLevel;
  to: AccessLevel;
}

export interface PersonLinkChange {
  userId: string;
  previousLink: string | null;
}

function applied<T>(value: T): RemediationResult<T> {
  return { status: 'applied', value };
}

function unchanged<T>(value: T): RemediationResult<T> {
  return { status: 'unchanged', value };
}

function sameName(person: PersonName, name: PersonName): boolean {
  return (
    person.givenName === name.givenName &&
    person.familyName === name.familyName &&
    blankToNull(person.additionalName) === blankToNull(name.additionalName)
  );
}

export class RemediationExecutor {
  private readonly gateway: ICatalogGateway;
  private readonly lookups?: PersonLookupCache;
  private readonly audit?: AuditTrail;
  private readonly logger: Logger;
  /** Persons a dry run would have created, by id */
  private readonly planned = new Map<string, CatalogPerson>();
  readonly dryRun: boolean;

  constructor(options: RemediationExecutorOptions) {
    this.gateway = options.gateway;
    this.lookups = options.lookups;
    this.audit = options.audit;
    this.logger = options.logger ?? silentLogger;
    this.dryRun = options.dryRun ?? false;
  }

  /**
   * Ensure a person with this name exists.
   * @returns the UUID of the existing or created person
   */
  createPerson(person: NewPerson): Promise<RemediationResult<string>> {
    return this.attempt('create_person', `${person.givenName} ${person.familyName}`, async () => {
      const skPersonId = person.skPersonId ?? null;
      const existing = await this.lookups?.findByName(person.givenName, person.familyName, skPersonId);
      if (existing) return unchanged(existing.id);
      const plannedId = this.findPlanned(person, skPersonId);
      if (plannedId) return unchanged(plannedId);

      const id = this.dryRun ? this.plan(person) : await this.gateway.createPerson(person);
      this.lookups?.invalidate();
      await this.record('create_person', id, {
        givenName: person.givenName,
        additionalName: person.additionalName ?? null,
        familyName: person.familyName,
        skPersonId: person.skPersonId ?? null,
      });
      return applied(id);
    });
  }

  /**
   * Ensure a user with this login id exists.
   * @returns the UUID of the existing or created user
   */
  createUser(user: NewUser): Promise<RemediationResult<string>> {
    const loginId = user.loginId.toLowerCase();
    return this.attempt('create_user', loginId, async () => {
      const existing = await this.gateway.findUserByLoginId(loginId);
      if (existing) return unchanged(existing.id);

      const request: NewUser = { ...user, loginId };
      const id = this.dryRun ? randomUUID() : await this.gateway.createUser(request);
      await this.record('create_user', id, {
        loginId,
        accessLevel: user.accessLevel,
        isPerson: user.isPerson ?? null,
      });
      return applied(id);
    });
  }

  linkPersonToPost(personId: string, postId: string): Promise<RemediationResult<string[]>> {
    return this.attempt('link_person_to_post', personId, async () => {
      const person = await this.requirePerson(personId);
      if (person.holdsPost.includes(postId)) return unchanged(person.holdsPost);

      const holdsPost = [...person.holdsPost, postId];
      await this.write('link_person_to_post', personId, { postId }, () =>
        this.gateway.updatePerson(personId, { holdsPost })
      );
      return applied(holdsPost);
    });
  }

  unlinkPersonFromPost(personId: string, postId: string): Promise<RemediationResult<string[]>> {
    return this.attempt('unlink_person_from_post', personId, async () => {
      const person = await this.requirePerson(personId);
      if (!person.holdsPost.includes(postId)) return unchanged(person.holdsPost);

      const holdsPost = person.holdsPost.filter((id) => id !== postId);
      await this.write('unlink_person_from_post', personId, { postId }, () =>
        this.gateway.updatePerson(personId, { holdsPost })
      );
      return applied(holdsPost);
    });
  }

  /**
   * @returns the previous full name
   */
  updatePersonName(personId: string, name: PersonName): Promise<RemediationResult<string>> {
    return this.attempt('update_person_name', personId, async () => {
      const person = await this.requirePerson(personId);
      const previous = [person.givenName, person.additionalName, person.familyName]
        .filter((part) => blankToNull(part) !== null)
        .join(' ');
      if (sameName(person, name)) return unchanged(previous);

      const patch = {
        givenName: name.givenName,
        additionalName: blankToNull(name.additionalName),
        familyName: name.familyName,
      };
      await this.write('update_person_name', personId, { ...patch, previous }, () =>
        this.gateway.updatePerson(personId, patch)
      );
      this.lookups?.invalidate();
      return applied(previous);
    });
  }

  /**
   * @returns the previous directory id
   */
  updatePersonSkId(personId: string, skPersonId: string): Promise<RemediationResult<string | null>> {
    return this.attempt('update_person_sk_id', personId, async () => {
      const person = await this.requirePerson(personId);
      if (person.skPersonId === skPersonId) return unchanged(person.skPersonId);

      await this.write('update_person_sk_id', personId, { skPersonId, previous: person.skPersonId }, () =>
        this.gateway.updatePerson(personId, { customProperties: { [PERSON_ID_PROPERTY]: skPersonId } })
      );
      this.lookups?.invalidate();
      return applied(person.skPersonId);
    });
  }

  updateUserAccessLevel(loginId: string, accessLevel: AccessLevel): Promise<RemediationResult<AccessLevelChange>> {
    return this.attempt('update_user_access_level', loginId, async () => {
      const user = await this.requireUser(loginId);
      const change: AccessLevelChange = { userId: user.id, from: user.accessLevel, to: accessLevel };
      if (user.accessLevel === accessLevel) return unchanged(change);

      await this.write('update_user_access_level', user.id, { loginId, from: user.accessLevel, to: accessLevel }, () =>
        this.gateway.updateUser(user.id, { accessLevel })
      );
      return applied(change);
    });
  }

  /**
   * Point a user at a person. `personLink` is the "Family, Given" reference the
   * catalog resolves on write; `personId` is what the link reads back as.
   */
  updateUserPersonLink(
    loginId: string,
    personId: string,
    personLink: string
  ): Promise<RemediationResult<PersonLinkChange>> {
    return this.attempt('update_user_person_link', loginId, async () => {
      const user = await this.requireUser(loginId);
      const change: PersonLinkChange = { userId: user.id, previousLink: user.isPerson };
      if (user.isPerson === personId) return unchanged(change);

      await this.write('update_user_person_link', user.id, { loginId, personId, personLink }, () =>
        this.gateway.updateUser(user.id, { isPerson: personLink })
      );
      return applied(change);
    });
  }

  /**
   * Set every contact property to its target value.
   * @returns the fields that differed
   */
  updateContactDetails(personId: string, target: ContactProperties): Promise<RemediationResult<ContactDifference[]>> {
    return this.attempt('update_contact_details', personId, async () => {
      const person = await this.requirePerson(personId);
      const current: ContactProperties = {
        email_custom_property: null,
        phone: null,
        state_calendar_website: null,
        teams: null,
      };
      for (const field of CONTACT_FIELDS) {
        current[field] = person.customProperties[field] ?? null;
      }

      const differences = diffContactProperties(current, target);
      if (differences.length === 0) return unchanged(differences);

      await this.write('update_contact_details', personId, { differences }, () =>
        this.gateway.updatePerson(personId, { customProperties: { ...target } })
      );
      return applied(differences);
    });
  }

  private async attempt<T>(
    operation: RemediationOperation,
    subject: string,
    body: () => Promise<RemediationResult<T>>
  ): Promise<RemediationResult<T>> {
    try {
      const result = await body();
      if (result.status === 'applied') {
        this.logger.info('Remediation applied', { operation, subject, dryRun: this.dryRun });
      }
      return result;
    } catch (err) {
      const error = errorMessage(err);
      this.logger.warn('Remediation failed', { operation, subject, error });
      return { status: 'failed', error };
    }
  }

  private async write(
    operation: RemediationOperation,
    target: string,
    details: Record<string, unknown>,
    apply: () => Promise<void>
  ): Promise<void> {
    if (!this.dryRun) await apply();
    await this.record(operation, target, details);
  }

  /** Audit failures are logged; the catalog write already happened */
  private async record(operation: RemediationOperation, target: string, details: Record<string, unknown>): Promise<void> {
    if (!this.audit) return;
    try {
      await this.audit.append({ database: this.gateway.database, operation, target, details, dryRun: this.dryRun });
    } catch (err) {
      this.logger.error('Audit entry not written', { operation, target, error: err });
    }
  }

  private plan(person: NewPerson): string {
    const id = randomUUID();
    this.planned.set(id, {
      id,
      givenName: person.givenName,
      additionalName: person.additionalName ?? null,
      familyName: person.familyName,
      skPersonId: person.skPersonId ?? null,
      holdsPost: [],
      customProperties: {},
    });
    return id;
  }

  private findPlanned(name: PersonName, skPersonId: string | null): string | undefined {
    const key = personNameKey(name.givenName, name.familyName);
    for (const person of this.planned.values()) {
      if (personNameKey(person.givenName, person.familyName) !== key) continue;
      if (person.skPersonId === null || person.skPersonId === skPersonId) return person.id;
    }
    return undefined;
  }

  private async requirePerson(personId: string): Promise<CatalogPerson> {
    const planned = this.planned.get(personId);
    if (planned) return planned;

    const person = await this.gateway.getPerson(personId);
    if (!person) {
      throw new SyncError({
        code: 'STATE_UNAVAILABLE',
        message: `Person ${personId} not found in the catalog`,
        context: { personId },
      });
    }
    return person;
  }

  private async requireUser(loginId: string): Promise<CatalogUser> {
    const user = await this.gateway.findUserByLoginId(loginId.toLowerCase());
    if (!user) {
      throw new SyncError({
        code: 'STATE_UNAVAILABLE',
        message: `User ${loginId} not found in the catalog`,
        context: { loginId },
      });
    }
    return user;
  }
}
