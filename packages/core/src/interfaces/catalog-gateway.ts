/**
 * Catalog Gateway Interface
 *
 * The subset of the catalog API the reconciliation engine reads and writes through.
 * The HTTP client implements it; tests substitute an in-memory catalog.
 */

import type {
  CatalogAsset,
  CatalogPerson,
  CatalogUser,
  NewPerson,
  NewUser,
  PersonPatch,
  QueryRow,
  ResourceCollection,
  UserPatch,
} from '../types/index.js';

export interface ICatalogGateway {
  /** Catalog database the gateway is bound to */
  readonly database: string;

  /**
   * Run a declarative query and return its rows.
   * Custom property values come back quoted and must be unquoted by the caller.
   */
  executeQuery(sql: string): Promise<QueryRow[]>;

  /** Download every asset of a scheme */
  downloadAssets(scheme: string): Promise<CatalogAsset[]>;

  /** @returns undefined when the person does not exist */
  getPerson(personId: string): Promise<CatalogPerson | undefined>;

  /** @returns UUID of the created person */
  createPerson(person: NewPerson): Promise<string>;

  updatePerson(personId: string, patch: PersonPatch): Promise<void>;

  /** Case-insensitive lookup by login id */
  findUserByLoginId(loginId: string): Promise<CatalogUser | undefined>;

  /** @returns UUID of the created user */
  createUser(user: NewUser): Promise<string>;

  updateUser(userId: string, patch: UserPatch): Promise<void>;

  /** Soft delete: move a resource into the review status */
  markForReview(collection: ResourceCollection, id: string): Promise<void>;

  /** Link to the person's page in the catalog web UI */
  personWebUrl(personId: string): string;
}
