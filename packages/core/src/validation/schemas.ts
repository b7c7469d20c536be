/**
 * Zod schemas for payloads received from the catalog and the directory
 */

import { z } from 'zod';
import { ACCESS_LEVELS, UPLOAD_OPERATIONS } from '../types/index.js';

/** Error body of a rejected catalog call */
export const apiErrorEnvelopeSchema = z
  .object({
    message: z.string().optional(),
    violations: z.array(z.unknown()).optional(),
    errors: z.array(z.unknown()).optional(),
  })
  .passthrough();

export const accessLevelSchema = z.enum(ACCESS_LEVELS);

export const uploadOperationSchema = z.enum(UPLOAD_OPERATIONS);

const collectionDataEntrySchema = z
  .object({
    name: z.string(),
    value: z.unknown().optional(),
    prompt: z.string().optional(),
  })
  .passthrough();

const collectionLinkSchema = z
  .object({
    rel: z.string(),
    href: z.string(),
    prompt: z.string().optional(),
  })
  .passthrough();

/** collection+json document as served by the directory */
export const collectionDocumentSchema = z.object({
  collection: z
    .object({
      version: z.string().optional(),
      href: z.string().optional(),
      items: z
        .array(
          z
            .object({
              href: z.string().optional(),
              data: z.array(collectionDataEntrySchema).optional(),
              links: z.array(collectionLinkSchema).optional(),
            })
            .passthrough()
        )
        .optional(),
    })
    .passthrough(),
});

export const directoryTokenSchema = z.object({
  token: z.string().min(1),
});

export const oauthTokenSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().positive().optional(),
  token_type: z.string().optional(),
});

const nullableString = z.string().nullable().optional();

/** Person resource as returned by GET /rest/{db}/persons/{uuid} */
export const personResourceSchema = z
  .object({
    id: z.string(),
    _type: z.literal('Person').optional(),
    givenName: nullableString,
    additionalName: nullableString,
    familyName: nullableString,
    holdsPost: z.union([z.array(z.string()), z.string()]).nullable().optional(),
    customProperties: z.record(z.unknown()).nullable().optional(),
  })
  .passthrough();

/** Body returned by a create call */
export const createdResourceSchema = z
  .object({
    id: z.string().min(1),
  })
  .passthrough();

export const queryResultSchema = z.array(z.record(z.unknown()));

export const assetListSchema = z.array(
  z
    .object({
      id: z.string().optional(),
      _type: z.string().optional(),
      inCollection: z.string().nullable().optional(),
    })
    .passthrough()
);

export type CollectionDocumentInput = z.infer<typeof collectionDocumentSchema>;
export type PersonResourceInput = z.infer<typeof personResourceSchema>;
