/**
 * Check #5: persons with a directory id have a login account that points back
 * at them, with access matching whether they hold posts.
 *
 * Holders of posts get at least EDITOR; editors without posts drop to
 * READ_ONLY. Administrators are left alone.
 */

import { errorMessage, formatPersonLink, type AccessLevel, type CatalogUser } from '@catalogsync/core';
import type { PersonPostCountRow } from '../types/index.js';
import { throttledLookup, type Check } from './context.js';

function targetAccessLevel(current: AccessLevel, holdsPosts: boolean): AccessLevel {
  if (current === 'ADMINISTRATOR') return current;
  return holdsPosts ? 'EDITOR' : 'READ_ONLY';
}

function displayName(person: PersonPostCountRow): string {
  return [person.givenName, person.familyName].filter((part) => part !== null).join(' ');
}

export const userAccountsCheck: Check = {
  id: 'user-accounts',
  title: 'User accounts',

  async run(context, ledger) {
    const persons = await context.state.listPersonsWithPostCounts();
    const users = await context.state.listUsers();

    const usersByLogin = new Map<string, CatalogUser>();
    for (const user of users) usersByLogin.set(user.loginId, user);

    context.logger.info('Checking user accounts', { persons: persons.length, users: users.length });

    for (const person of persons) {
      const skPersonId = person.skPersonId;
      if (!skPersonId) continue;
      const personName = displayName(person);
      const subject = { personId: person.id, personName };
      const holdsPosts = person.postCount > 0;

      let email: string | null;
      try {
        email = await throttledLookup(context, () => context.directory.getPersonEmail(skPersonId));
      } catch (err) {
        ledger.open({
          type: 'directory_person_unavailable',
          ...subject,
          skPersonId,
          error: errorMessage(err),
          message: `Could not read directory person ${skPersonId} for ${personName}`,
        });
        continue;
      }

      if (!email) {
        ledger.open({
          type: 'person_missing_email',
          ...subject,
          skPersonId,
          message: `Person ${personName} has no email address in the directory`,
        });
        continue;
      }

      const loginId = email.toLowerCase();
      const user = usersByLogin.get(loginId);

      if (!user) {
        if (!holdsPosts) continue;
        if (!person.givenName || !person.familyName) {
          ledger.open({
            type: 'missing_person_name',
            personId: person.id,
            skPersonId,
            message: `Person ${person.id} with directory id ${skPersonId} has no account and is missing a given or family name`,
          });
          continue;
        }
        const result = await context.executor.createUser({
          loginId,
          accessLevel: 'EDITOR',
          isPerson: formatPersonLink({ givenName: person.givenName, familyName: person.familyName }),
          name: personName,
        });
        ledger.recordRemediation(
          {
            type: 'user_created',
            ...subject,
            email: loginId,
            accessLevel: 'EDITOR',
            message: `Created EDITOR account ${loginId} for ${personName}, who holds ${person.postCount} post(s)`,
          },
          result
        );
        continue;
      }

      if (user.isPerson !== person.id && person.givenName && person.familyName) {
        const link = formatPersonLink({ givenName: person.givenName, familyName: person.familyName });
        const result = await context.executor.updateUserPersonLink(loginId, person.id, link);
        ledger.recordRemediation(
          {
            type: 'user_link_updated',
            ...subject,
            userId: user.id,
            email: loginId,
            previousLink: user.isPerson,
            message: `Linked account ${loginId} to person ${personName}`,
          },
          result
        );
      }

      const accessLevel = targetAccessLevel(user.accessLevel, holdsPosts);
      if (accessLevel !== user.accessLevel) {
        const result = await context.executor.updateUserAccessLevel(loginId, accessLevel);
        ledger.recordRemediation(
          {
            type: 'access_level_updated',
            ...subject,
            userId: user.id,
            email: loginId,
            from: user.accessLevel,
            to: accessLevel,
            message: `Changed access of ${loginId} from ${user.accessLevel} to ${accessLevel} (${person.postCount} post(s))`,
          },
          result
        );
      }
    }
  },
};
