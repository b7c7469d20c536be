/**
 * Directory Gateway Interface
 *
 * Raw access to the personnel directory. Parsing and memoization live in the
 * directory cache, which is the only consumer.
 */

import type { CollectionDocument } from '../types/index.js';

export interface IDirectoryGateway {
  fetchMembership(membershipId: string): Promise<CollectionDocument>;
  fetchPerson(personId: string): Promise<CollectionDocument>;
}
