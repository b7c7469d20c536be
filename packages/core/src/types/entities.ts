/**
 * Catalog entities touched by reconciliation
 */

export const ACCESS_LEVELS = ['READ_ONLY', 'EDITOR', 'ADMINISTRATOR'] as const;

/** Access level of a catalog login account */
export type AccessLevel = (typeof ACCESS_LEVELS)[number];

export interface PersonName {
  givenName: string;
  /** Middle name(s), if any */
  additionalName?: string | null;
  familyName: string;
}

/** A Person as stored in the catalog */
export interface CatalogPerson extends PersonName {
  id: string;
  /** Directory person identifier (custom property `sk_person_id`) */
  skPersonId: string | null;
  /** UUIDs of the posts this person holds */
  holdsPost: string[];
  customProperties: Record<string, string | null>;
}

export interface NewPerson extends PersonName {
  skPersonId?: string;
}

/** Partial update for a Person. Omitted fields stay untouched. */
export interface PersonPatch {
  givenName?: string;
  additionalName?: string | null;
  familyName?: string;
  holdsPost?: string[];
  customProperties?: Record<string, string | null>;
}

/** A catalog login account */
export interface CatalogUser {
  id: string;
  /** Lowercased email address */
  loginId: string;
  accessLevel: AccessLevel;
  /** Linked person, by UUID when read back and by "Family, Given" when written */
  isPerson: string | null;
}

export interface NewUser {
  loginId: string;
  accessLevel: AccessLevel;
  isPerson?: string;
  name?: string;
}

export interface UserPatch {
  accessLevel?: AccessLevel;
  isPerson?: string;
}

/** Row of the identity mapping table */
export interface MappingEntry {
  type: string;
  uuid: string;
  containerPath: string | null;
}
