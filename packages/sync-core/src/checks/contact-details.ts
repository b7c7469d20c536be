/**
 * Check #6: contact properties of persons with a directory id mirror the
 * directory. Starts from a cleared directory cache.
 */

import { errorMessage, type ContactDetails } from '@catalogsync/core';
import { computeContactTarget, diffContactProperties } from '../diff/index.js';
import { throttledLookup, type Check } from './context.js';

export const contactDetailsCheck: Check = {
  id: 'contact-details',
  title: 'Contact details',

  async run(context, ledger) {
    context.directory.invalidate();
    const persons = await context.state.listPersonContacts();
    context.logger.info('Checking contact details', { persons: persons.length });

    for (const [index, person] of persons.entries()) {
      const skPersonId = person.skPersonId;
      if (!skPersonId) continue;

      const { givenName, familyName } = person;
      if (!givenName || !familyName) {
        ledger.open({
          type: 'missing_person_name',
          personId: person.id,
          skPersonId,
          message: `Person ${person.id} with directory id ${skPersonId} is missing a given or family name`,
        });
        continue;
      }
      const personName = `${givenName} ${familyName}`;
      context.logger.debug(`[${index + 1}/${persons.length}] ${personName}`);

      let contact: ContactDetails;
      try {
        contact = await throttledLookup(context, () => context.directory.getContactDetails(skPersonId));
      } catch (err) {
        ledger.open({
          type: 'directory_person_unavailable',
          personId: person.id,
          personName,
          skPersonId,
          error: errorMessage(err),
          message: `Could not read directory person ${skPersonId} for ${personName}`,
        });
        continue;
      }

      const target = computeContactTarget({ skPersonId, givenName, familyName }, contact, context.directoryWebBaseUrl);
      const differences = diffContactProperties(person.contact, target);
      if (differences.length === 0) continue;

      const result = await context.executor.updateContactDetails(person.id, target);
      ledger.recordRemediation(
        {
          type: 'contact_details_updated',
          personId: person.id,
          personName,
          skPersonId,
          differences,
          message: `Updated ${differences.map((difference) => difference.field).join(', ')} of ${personName}`,
        },
        result
      );
    }
  },
};
