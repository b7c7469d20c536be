/**
 * Directory Cache
 *
 * Run-scoped memo of directory lookups. A hit never touches the network.
 * Failed lookups are not cached, so a later call for the same id retries.
 */

import {
  silentLogger,
  type CollectionDocument,
  type ContactDetails,
  type DirectoryPerson,
  type IDirectoryGateway,
  type Logger,
  type MembershipInfo,
} from '@catalogsync/core';
import { SyncError } from '../errors/index.js';

const PHONE_FIELDS = new Set(['phone', 'telephone', 'phone_number']);

export interface DirectoryCacheStats {
  hits: number;
  networkCalls: number;
  memberships: number;
  persons: number;
}

function textValue(value: unknown): string | null {
  if (typeof value === 'number') return String(value);
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function lastPathSegment(href: string): string | null {
  const path = href.split(/[?#]/)[0] ?? '';
  const segments = path.split('/').filter((segment) => segment.length > 0);
  return segments[segments.length - 1] ?? null;
}

export function findPersonLink(document: CollectionDocument): string | null {
  for (const item of document.collection.items ?? []) {
    for (const link of item.links ?? []) {
      if (link.rel === 'person' && link.href) return link.href;
    }
  }
  return null;
}

/**
 * Reduce a person document to the compared fields. `first_name` is split on the
 * first space into given and additional name.
 */
export function parseDirectoryPerson(personId: string, document: CollectionDocument): DirectoryPerson {
  const items = document.collection.items ?? [];
  if (items.length === 0) {
    throw new SyncError({
      code: 'INCOMPLETE_PERSON_DATA',
      message: `Directory person ${personId} has no data`,
      context: { personId },
    });
  }

  const person: DirectoryPerson = {
    personId,
    givenName: null,
    additionalName: null,
    familyName: null,
    email: null,
    phone: null,
  };

  for (const item of items) {
    for (const entry of item.data ?? []) {
      const value = textValue(entry.value);
      if (value === null) continue;

      if (entry.name === 'email') {
        if (person.email === null) person.email = value;
      } else if (PHONE_FIELDS.has(entry.name)) {
        if (person.phone === null) person.phone = value;
      } else if (entry.name === 'first_name' && person.givenName === null) {
        const space = value.indexOf(' ');
        if (space === -1) {
          person.givenName = value;
        } else {
          person.givenName = value.slice(0, space);
          person.additionalName = textValue(value.slice(space + 1));
        }
      } else if (entry.name === 'last_name' && person.familyName === null) {
        person.familyName = value;
      }
    }
  }

  return person;
}

export class DirectoryCache {
  private readonly memberships = new Map<string, MembershipInfo>();
  private readonly persons = new Map<string, DirectoryPerson>();
  private hits = 0;
  private networkCalls = 0;
  private readonly logger: Logger;

  constructor(
    private readonly gateway: IDirectoryGateway,
    options: { logger?: Logger } = {}
  ) {
    this.logger = options.logger ?? silentLogger;
  }

  async getMembership(membershipId: string): Promise<MembershipInfo> {
    const id = membershipId.trim();
    if (!id) {
      throw new SyncError({
        code: 'INVALID_MEMBERSHIP',
        message: 'Membership id is empty',
      });
    }

    const cached = this.memberships.get(id);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.networkCalls += 1;
    const document = await this.gateway.fetchMembership(id);
    const personLink = findPersonLink(document);
    const personId = personLink ? lastPathSegment(personLink) : null;
    if (!personLink || !personId) {
      throw new SyncError({
        code: 'MISSING_PERSON_LINK',
        message: `Membership ${id} has no person link`,
        suggestion: 'The membership may have ended; update the post in the catalog.',
        context: { membershipId: id },
      });
    }

    const membership: MembershipInfo = { membershipId: id, personId, personLink };
    this.memberships.set(id, membership);
    return membership;
  }

  async getPersonById(personId: string): Promise<DirectoryPerson> {
    const id = personId.trim();
    const cached = this.persons.get(id);
    if (cached) {
      this.hits += 1;
      return cached;
    }

    this.networkCalls += 1;
    const document = await this.gateway.fetchPerson(id);
    const person = parseDirectoryPerson(id, document);
    this.persons.set(id, person);
    return person;
  }

  async getPersonByMembership(membershipId: string): Promise<DirectoryPerson> {
    const membership = await this.getMembership(membershipId);
    return this.getPersonById(membership.personId);
  }

  async getPersonEmail(personId: string): Promise<string | null> {
    return (await this.getPersonById(personId)).email;
  }

  async getContactDetails(personId: string): Promise<ContactDetails> {
    const person = await this.getPersonById(personId);
    return { email: person.email, phone: person.phone };
  }

  /** Drop every cached membership and person */
  invalidate(): void {
    this.logger.debug('Directory cache invalidated', {
      memberships: this.memberships.size,
      persons: this.persons.size,
    });
    this.memberships.clear();
    this.persons.clear();
  }

  stats(): DirectoryCacheStats {
    return {
      hits: this.hits,
      networkCalls: this.networkCalls,
      memberships: this.memberships.size,
      persons: this.persons.size,
    };
  }
}
