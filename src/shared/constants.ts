/** `business_status` value the places API uses for businesses that closed for good. */
export const CLOSED_PERMANENTLY = 'CLOSED_PERMANENTLY';

/** Ids per `IN (...)` list; keeps every statement under SQLite's bind-parameter limit. */
export const ID_CHUNK_SIZE = 800;

export const AI_REASON_MAX_LENGTH = 400;
export const INDUSTRY_BUCKET_MAX_LENGTH = 80;

export const DEFAULT_PAGE_SIZE = 50;
export const MAX_PAGE_SIZE = 500;

/** Discovery queries accepted by one POST /runs. */
export const MAX_RUN_QUERIES = 50;
