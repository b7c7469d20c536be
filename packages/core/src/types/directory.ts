/**
 * Directory (collection+json) payloads and parsed views
 */

export interface CollectionDataEntry {
  name: string;
  value?: unknown;
  prompt?: string;
}

export interface CollectionLink {
  rel: string;
  href: string;
  prompt?: string;
}

export interface CollectionItem {
  href?: string;
  data?: CollectionDataEntry[];
  links?: CollectionLink[];
}

export interface CollectionDocument {
  collection: {
    version?: string;
    href?: string;
    items?: CollectionItem[];
  };
}

export interface MembershipInfo {
  membershipId: string;
  personId: string;
  personLink: string;
}

/** A directory person reduced to the fields reconciliation compares */
export interface DirectoryPerson {
  personId: string;
  givenName: string | null;
  additionalName: string | null;
  familyName: string | null;
  email: string | null;
  phone: string | null;
}

export interface ContactDetails {
  email: string | null;
  phone: string | null;
}
