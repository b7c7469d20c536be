import { describe, expect, it, vi } from 'vitest';
import type { QueryRow } from '@catalogsync/core';
import { SyncError } from '../src/errors/index.js';
import { QueryCatalogState } from '../src/state/index.js';

function stateReturning(rows: QueryRow[]) {
  const executeQuery = vi.fn(async (_sql: string): Promise<QueryRow[]> => rows);
  return { state: new QueryCatalogState({ executeQuery }), executeQuery };
}

describe('QueryCatalogState', () => {
  it('unquotes custom property values', async () => {
    const { state, executeQuery } = stateReturning([
      { person_uuid: 'u1', given_name: 'Anna', additional_name: null, family_name: 'Beispiel', sk_person_id: '"2001"' },
      { person_uuid: 'u2', given_name: 'Bruno', family_name: 'Muster', sk_person_id: null },
    ]);

    expect(await state.listPersons()).toEqual([
      { id: 'u1', givenName: 'Anna', additionalName: null, familyName: 'Beispiel', skPersonId: '2001' },
      { id: 'u2', givenName: 'Bruno', additionalName: null, familyName: 'Muster', skPersonId: null },
    ]);
    expect(executeQuery).toHaveBeenCalledTimes(1);
    expect(executeQuery.mock.calls[0]?.[0]).toContain("cp.name = 'sk_person_id'");
  });

  it('collects primary and secondary membership ids per post', async () => {
    const { state } = stateReturning([
      { post_uuid: 'p1', post_label: 'Head of Finance', sk_membership_id: '"M1"', sk_second_membership_id: null },
      { post_uuid: 'p2', post_label: 'Clerk', sk_membership_id: '""', sk_second_membership_id: '" M9 "' },
      { post_uuid: 'p3', post_label: 'Deputy', sk_membership_id: '"M3"', sk_second_membership_id: '"M4"' },
    ]);

    expect(await state.listPostsWithMemberships()).toEqual([
      { postId: 'p1', postLabel: 'Head of Finance', membershipIds: ['M1'] },
      { postId: 'p2', postLabel: 'Clerk', membershipIds: ['M9'] },
      { postId: 'p3', postLabel: 'Deputy', membershipIds: ['M3', 'M4'] },
    ]);
  });

  it('reads post counts and contact properties', async () => {
    const counts = stateReturning([
      { person_uuid: 'u1', given_name: 'Anna', family_name: 'Beispiel', sk_person_id: '"2001"', posts_count: '2' },
    ]);
    expect(await counts.state.listPersonsWithPostCounts()).toEqual([
      { id: 'u1', givenName: 'Anna', additionalName: null, familyName: 'Beispiel', skPersonId: '2001', postCount: 2 },
    ]);

    const contacts = stateReturning([
      {
        person_uuid: 'u1',
        given_name: 'Anna',
        family_name: 'Beispiel',
        sk_person_id: '"2001"',
        email_custom_property: '"anna@example.test"',
        phone: '"[061](tel:061)"',
        state_calendar_website: null,
        teams: '""',
      },
    ]);
    expect((await contacts.state.listPersonContacts())[0]?.contact).toEqual({
      email_custom_property: 'anna@example.test',
      phone: '[061](tel:061)',
      state_calendar_website: null,
      teams: null,
    });
  });

  it('skips users it cannot reconcile', async () => {
    const { state } = stateReturning([
      { user_uuid: 'x1', email: 'Anna@Example.test', access_level: 'EDITOR', linked_person_uuid: 'u1' },
      { user_uuid: 'x2', email: 'robot@example.test', access_level: 'SUPERUSER', linked_person_uuid: null },
    ]);

    expect(await state.listUsers()).toEqual([
      { id: 'x1', loginId: 'anna@example.test', accessLevel: 'EDITOR', isPerson: 'u1' },
    ]);
  });

  it('fails on rows of an unexpected shape', async () => {
    const { state } = stateReturning([{ given_name: 'Anna' }]);

    const error = await state.listPersons().catch((err: unknown) => err);
    expect(error instanceof SyncError && error.code).toBe('STATE_UNAVAILABLE');
  });
});
