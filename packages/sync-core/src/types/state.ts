/**
 * IS / SHOULD snapshot types
 */

/** A Post carrying directory membership ids */
export interface PostWithMemberships {
  postId: string;
  postLabel: string;
  /** Primary and secondary membership ids, trimmed, empty ones dropped */
  membershipIds: string[];
}

export interface PostRow {
  postId: string;
  postLabel: string;
}

/** One Person↔Post link */
export interface AssignmentRow {
  postId: string;
  postLabel: string;
  personId: string;
  personName: string;
}

/** Person as read by bulk query; names may be missing in the catalog */
export interface CatalogPersonRow {
  id: string;
  givenName: string | null;
  additionalName: string | null;
  familyName: string | null;
  skPersonId: string | null;
}

export interface PersonPostCountRow extends CatalogPersonRow {
  postCount: number;
}

export const CONTACT_FIELDS = ['email_custom_property', 'phone', 'state_calendar_website', 'teams'] as const;

/** Custom properties maintained from directory contact data */
export type ContactField = (typeof CONTACT_FIELDS)[number];

export type ContactProperties = Record<ContactField, string | null>;

export interface PersonContactRow extends CatalogPersonRow {
  contact: ContactProperties;
}

export interface ContactDifference {
  field: ContactField;
  current: string | null;
  target: string | null;
}

/** post id → person ids */
export type AssignmentMap = Map<string, Set<string>>;

/** Desired post occupancy derived from the directory */
export interface AssignmentShould {
  byPost: AssignmentMap;
  /** Posts whose SHOULD could not be computed; excluded from the diff */
  unresolvedPosts: Set<string>;
}

export interface AssignmentOperation {
  kind: 'link' | 'unlink';
  postId: string;
  personId: string;
}
