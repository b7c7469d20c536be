/**
 * Catalog State Fetchers
 *
 * IS-state reads, each a single bulk query against the catalog. Custom property
 * values arrive quoted and are unquoted here.
 */

import { z } from 'zod';
import {
  cellText,
  toCatalogUser,
  type CatalogUser,
  type ICatalogGateway,
  type QueryRow,
} from '@catalogsync/core';
import { SyncError } from '../errors/index.js';
import type {
  AssignmentRow,
  CatalogPersonRow,
  PersonContactRow,
  PersonPostCountRow,
  PostRow,
  PostWithMemberships,
} from '../types/index.js';

/** Bulk reads the checks depend on */
export interface CatalogState {
  listPersons(): Promise<CatalogPersonRow[]>;
  listPostsWithMemberships(): Promise<PostWithMemberships[]>;
  listAssignments(): Promise<AssignmentRow[]>;
  listUnoccupiedPosts(): Promise<PostRow[]>;
  listPersonsWithPostCounts(): Promise<PersonPostCountRow[]>;
  listUsers(): Promise<CatalogUser[]>;
  /** Persons carrying a directory id, with their contact properties */
  listPersonContacts(): Promise<PersonContactRow[]>;
}

export const PERSON_ID_PROPERTY = 'sk_person_id';
export const MEMBERSHIP_PROPERTIES = ['sk_membership_id', 'sk_second_membership_id'] as const;

const PERSONS_QUERY = `
  SELECT
    p.id AS person_uuid,
    p.given_name,
    p.additional_name,
    p.family_name,
    cp.value AS sk_person_id
  FROM
    person_view p
  LEFT JOIN
    customproperties_view cp ON p.id = cp.resource_id AND cp.name = '${PERSON_ID_PROPERTY}'
  ORDER BY
    p.family_name, p.given_name
`;

const POSTS_WITH_MEMBERSHIPS_QUERY = `
  SELECT
    p.id AS post_uuid,
    p.label AS post_label,
    cp1.value AS sk_membership_id,
    cp2.value AS sk_second_membership_id
  FROM
    post_view p
  LEFT JOIN
    customproperties_view cp1 ON p.id = cp1.resource_id AND cp1.name = '${MEMBERSHIP_PROPERTIES[0]}'
  LEFT JOIN
    customproperties_view cp2 ON p.id = cp2.resource_id AND cp2.name = '${MEMBERSHIP_PROPERTIES[1]}'
  WHERE
    cp1.value IS NOT NULL OR cp2.value IS NOT NULL
  ORDER BY
    p.label
`;

const ASSIGNMENTS_QUERY = `
  SELECT
    p.id AS person_uuid,
    p.given_name,
    p.family_name,
    post.id AS post_uuid,
    post.label AS post_label
  FROM
    person_view p
  JOIN
    holdspost_view hp ON p.id = hp.resource_id
  JOIN
    post_view post ON post.id = hp.holds_post
`;

const UNOCCUPIED_POSTS_QUERY = `
  SELECT
    p.id AS post_uuid,
    p.label AS post_label
  FROM
    post_view p
  WHERE
    NOT EXISTS (
      SELECT 1
      FROM holdspost_view h
      WHERE h.holds_post = p.id
    )
  ORDER BY
    p.label
`;

const PERSON_POST_COUNTS_QUERY = `
  SELECT
    p.id AS person_uuid,
    p.given_name,
    p.additional_name,
    p.family_name,
    cp.value AS sk_person_id,
    COUNT(DISTINCT hp.holds_post) AS posts_count
  FROM
    person_view p
  JOIN
    customproperties_view cp ON p.id = cp.resource_id AND cp.name = '${PERSON_ID_PROPERTY}'
  LEFT JOIN
    holdspost_view hp ON p.id = hp.resource_id
  GROUP BY
    p.id, p.given_name, p.additional_name, p.family_name, cp.value
  ORDER BY
    p.family_name, p.given_name
`;

const USERS_QUERY = `
  SELECT
    u.id AS user_uuid,
    u.login_id AS email,
    u.access_level,
    u.is_person AS linked_person_uuid
  FROM
    user_view u
  WHERE
    u.service_user IS NULL OR u.service_user = false
  ORDER BY
    u.login_id
`;

const PERSON_CONTACTS_QUERY = `
  SELECT
    p.id AS person_uuid,
    p.given_name,
    p.additional_name,
    p.family_name,
    cp_sk.value AS sk_person_id,
    cp_email.value AS email_custom_property,
    cp_phone.value AS phone,
    cp_website.value AS state_calendar_website,
    cp_teams.value AS teams
  FROM
    person_view p
  JOIN
    customproperties_view cp_sk ON p.id = cp_sk.resource_id AND cp_sk.name = '${PERSON_ID_PROPERTY}'
  LEFT JOIN
    customproperties_view cp_email ON p.id = cp_email.resource_id AND cp_email.name = 'email_custom_property'
  LEFT JOIN
    customproperties_view cp_phone ON p.id = cp_phone.resource_id AND cp_phone.name = 'phone'
  LEFT JOIN
    customproperties_view cp_website ON p.id = cp_website.resource_id AND cp_website.name = 'state_calendar_website'
  LEFT JOIN
    customproperties_view cp_teams ON p.id = cp_teams.resource_id AND cp_teams.name = 'teams'
  ORDER BY
    p.family_name, p.given_name
`;

const personRowSchema = z
  .object({
    person_uuid: z.string().min(1),
    given_name: z.unknown(),
    additional_name: z.unknown().optional(),
    family_name: z.unknown(),
    sk_person_id: z.unknown().optional(),
  })
  .passthrough();

const postRowSchema = z
  .object({
    post_uuid: z.string().min(1),
    post_label: z.unknown(),
  })
  .passthrough();

function parseRows<T extends z.ZodTypeAny>(schema: T, rows: QueryRow[], what: string): z.infer<T>[] {
  return rows.map((row, index) => {
    const parsed = schema.safeParse(row);
    if (!parsed.success) {
      throw new SyncError({
        code: 'STATE_UNAVAILABLE',
        message: `Unexpected ${what} row #${index}: ${parsed.error.issues[0]?.message ?? 'invalid'}`,
        suggestion: 'The catalog query views may have changed.',
      });
    }
    return parsed.data;
  });
}

function toPersonRow(row: z.infer<typeof personRowSchema>): CatalogPersonRow {
  return {
    id: row.person_uuid,
    givenName: cellText(row.given_name),
    additionalName: cellText(row.additional_name),
    familyName: cellText(row.family_name),
    skPersonId: cellText(row.sk_person_id),
  };
}

function joinName(given: unknown, family: unknown): string {
  return [cellText(given), cellText(family)].filter((part) => part !== null).join(' ');
}

export class QueryCatalogState implements CatalogState {
  constructor(private readonly catalog: Pick<ICatalogGateway, 'executeQuery'>) {}

  async listPersons(): Promise<CatalogPersonRow[]> {
    const rows = await this.catalog.executeQuery(PERSONS_QUERY);
    return parseRows(personRowSchema, rows, 'person').map(toPersonRow);
  }

  async listPostsWithMemberships(): Promise<PostWithMemberships[]> {
    const rows = await this.catalog.executeQuery(POSTS_WITH_MEMBERSHIPS_QUERY);
    const posts = new Map<string, PostWithMemberships>();

    for (const row of parseRows(postRowSchema, rows, 'post')) {
      const post = posts.get(row.post_uuid) ?? {
        postId: row.post_uuid,
        postLabel: cellText(row.post_label) ?? row.post_uuid,
        membershipIds: [],
      };
      for (const property of MEMBERSHIP_PROPERTIES) {
        const membershipId = cellText(row[property])?.trim();
        if (membershipId && !post.membershipIds.includes(membershipId)) {
          post.membershipIds.push(membershipId);
        }
      }
      posts.set(post.postId, post);
    }

    return [...posts.values()];
  }

  async listAssignments(): Promise<AssignmentRow[]> {
    const rows = await this.catalog.executeQuery(ASSIGNMENTS_QUERY);
    const schema = personRowSchema.merge(postRowSchema);
    return parseRows(schema, rows, 'assignment').map((row) => ({
      postId: row.post_uuid,
      postLabel: cellText(row.post_label) ?? row.post_uuid,
      personId: row.person_uuid,
      personName: joinName(row.given_name, row.family_name),
    }));
  }

  async listUnoccupiedPosts(): Promise<PostRow[]> {
    const rows = await this.catalog.executeQuery(UNOCCUPIED_POSTS_QUERY);
    return parseRows(postRowSchema, rows, 'post').map((row) => ({
      postId: row.post_uuid,
      postLabel: cellText(row.post_label) ?? row.post_uuid,
    }));
  }

  async listPersonsWithPostCounts(): Promise<PersonPostCountRow[]> {
    const rows = await this.catalog.executeQuery(PERSON_POST_COUNTS_QUERY);
    const schema = personRowSchema.extend({ posts_count: z.coerce.number().int().nonnegative() });
    return parseRows(schema, rows, 'person').map((row) => ({
      ...toPersonRow(row),
      postCount: row.posts_count,
    }));
  }

  async listUsers(): Promise<CatalogUser[]> {
    const rows = await this.catalog.executeQuery(USERS_QUERY);
    const users: CatalogUser[] = [];
    for (const row of rows) {
      const user = toCatalogUser(row);
      if (user) users.push(user);
    }
    return users;
  }

  async listPersonContacts(): Promise<PersonContactRow[]> {
    const rows = await this.catalog.executeQuery(PERSON_CONTACTS_QUERY);
    return parseRows(personRowSchema, rows, 'person').map((row) => ({
      ...toPersonRow(row),
      contact: {
        email_custom_property: cellText(row['email_custom_property']),
        phone: cellText(row['phone']),
        state_calendar_website: cellText(row['state_calendar_website']),
        teams: cellText(row['teams']),
      },
    }));
  }
}
