/**
 * Some iDigBio fields are indexed word by word, so breaking counts down by
 * them groups on single words. Their `.keyword` variants hold the full value.
 */
export const FIELD_REPLACEMENTS: Readonly<Record<string, string>> = {
  collector: "collector.keyword",
  locality: "locality.keyword",
  highertaxon: "highertaxon.keyword",
};

function remapField(field: string): string {
  return Object.hasOwn(FIELD_REPLACEMENTS, field) ? FIELD_REPLACEMENTS[field] : field;
}

/**
 * Replace breakdown field names with their keyword variants, element-wise for
 * lists. Unknown names pass through unchanged.
 */
export function remapTopFields(fields: string): string;
export function remapTopFields(fields: string[]): string[];
export function remapTopFields(fields: string | string[]): string | string[];
export function remapTopFields(fields: string | string[]): string | string[] {
  return Array.isArray(fields) ? fields.map(remapField) : remapField(fields);
}
