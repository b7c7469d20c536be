/**
 * Check #1: every directory person id is carried by at most one catalog person.
 * Duplicates are reported only; which record is canonical is a manual decision.
 */

import { formatFullName } from '@catalogsync/core';
import type { CatalogPersonRow } from '../types/index.js';
import type { Check } from './context.js';

function displayName(row: CatalogPersonRow): string {
  return formatFullName({
    givenName: row.givenName ?? '',
    additionalName: row.additionalName,
    familyName: row.familyName ?? '',
  });
}

export const uniquePersonIdCheck: Check = {
  id: 'unique-person-id',
  title: 'Unique directory person id',

  async run(context, ledger) {
    const persons = await context.state.listPersons();

    const groups = new Map<string, CatalogPersonRow[]>();
    for (const person of persons) {
      if (!person.skPersonId) continue;
      const group = groups.get(person.skPersonId) ?? [];
      group.push(person);
      groups.set(person.skPersonId, group);
    }

    for (const [skPersonId, group] of groups) {
      if (group.length < 2) continue;
      const personNames = group.map(displayName);
      ledger.open({
        type: 'duplicate_person_id',
        skPersonId,
        personIds: group.map((person) => person.id),
        personNames,
        message: `Directory person id ${skPersonId} is used by ${group.length} persons: ${personNames.join(', ')}`,
      });
    }

    context.logger.info('Directory person ids checked', { persons: persons.length, distinct: groups.size });
  },
};
