/**
 * Catalog API payload types
 */

/** One row returned by the declarative query endpoint */
export type QueryRow = { [column: string]: unknown };

export const UPLOAD_OPERATIONS = ['ADD', 'REPLACE', 'FULL_LOAD'] as const;

/**
 * Bulk upload mode.
 * ADD only adds or updates, REPLACE also retires assets missing from the upload,
 * FULL_LOAD reconciles the whole scheme.
 */
export type UploadOperation = (typeof UPLOAD_OPERATIONS)[number];

export interface UploadOptions {
  operation?: UploadOperation;
  dryRun?: boolean;
}

/** A typed record as downloaded from, or uploaded to, a scheme */
export interface CatalogAsset {
  id?: string;
  _type?: string;
  inCollection?: string | null;
  [field: string]: unknown;
}

export interface UploadResult {
  operation: UploadOperation;
  dryRun: boolean;
  /** Raw response body of the upload endpoint */
  response: unknown;
}

/** Resource collections addressable under /rest/{db}/ */
export type ResourceCollection = 'persons' | 'posts' | 'users' | 'collections' | 'datasets';
