/**
 * Rows returned by the catalog's declarative query endpoint
 */

import { z } from 'zod';
import type { CatalogUser, QueryRow } from '../types/index.js';
import { cellText } from '../utils/strings.js';
import { accessLevelSchema } from './schemas.js';

export const userRowSchema = z
  .object({
    user_uuid: z.string().min(1),
    email: z.unknown(),
    access_level: z.unknown(),
    linked_person_uuid: z.unknown().optional(),
  })
  .passthrough();

/**
 * Convert a user_view row. Rows with an unknown access level or no login id are
 * skipped, they cannot be reconciled.
 */
export function toCatalogUser(row: QueryRow): CatalogUser | undefined {
  const parsed = userRowSchema.safeParse(row);
  if (!parsed.success) return undefined;

  const loginId = cellText(parsed.data.email);
  const accessLevel = accessLevelSchema.safeParse(cellText(parsed.data.access_level));
  if (!loginId || !accessLevel.success) return undefined;

  return {
    id: parsed.data.user_uuid,
    loginId: loginId.toLowerCase(),
    accessLevel: accessLevel.data,
    isPerson: cellText(parsed.data.linked_person_uuid),
  };
}
