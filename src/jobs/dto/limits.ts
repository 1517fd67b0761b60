/** Largest batch a single job accepts */
export const MAX_BULK_ITEMS = 1000;
