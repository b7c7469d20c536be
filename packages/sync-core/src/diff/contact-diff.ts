/**
 * Contact detail properties derived from the directory
 */

import { blankToNull, urlJoin, type DirectoryPerson } from '@catalogsync/core';
import {
  CONTACT_FIELDS,
  type ContactDifference,
  type ContactProperties,
} from '../types/index.js';

export interface ContactSubject {
  skPersonId: string;
  givenName: string;
  familyName: string;
}

export function phoneLink(phone: string): string {
  const dialable = [...phone].filter((char) => char === '+' || (char >= '0' && char <= '9')).join('');
  return `[${phone}](tel:${dialable})`;
}

export function directoryPageLink(directoryWebBaseUrl: string, skPersonId: string): string {
  const base = directoryWebBaseUrl.replace(/\/+$/, '');
  return `[Open contact page in the directory](${base}/${urlJoin('person', skPersonId)})`;
}

export function chatLink(givenName: string, familyName: string, email: string): string {
  return `[Chat with ${givenName} ${familyName} in Teams](msteams://teams.microsoft.com/l/chat/0/0?users=${email})`;
}

export function computeContactTarget(
  subject: ContactSubject,
  directoryPerson: Pick<DirectoryPerson, 'email' | 'phone'>,
  directoryWebBaseUrl: string
): ContactProperties {
  const email = blankToNull(directoryPerson.email);
  const phone = blankToNull(directoryPerson.phone);

  return {
    email_custom_property: email,
    phone: phone ? phoneLink(phone) : null,
    state_calendar_website: directoryPageLink(directoryWebBaseUrl, subject.skPersonId),
    teams: email ? chatLink(subject.givenName, subject.familyName, email) : null,
  };
}

export function diffContactProperties(current: ContactProperties, target: ContactProperties): ContactDifference[] {
  const differences: ContactDifference[] = [];
  for (const field of CONTACT_FIELDS) {
    const was = blankToNull(current[field]);
    const wanted = blankToNull(target[field]);
    if (was !== wanted) {
      differences.push({ field, current: was, target: wanted });
    }
  }
  return differences;
}
