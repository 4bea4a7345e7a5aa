/**
 * Object key layout
 *
 *   <parent>/<agency>/<document_number> - <truncated title>.pdf
 *   <parent>/abstracts.json
 */

export const TITLE_MAX_LENGTH = 30;
export const INDEX_FILE_NAME = "abstracts.json";

// Characters that are unsafe in file names on common file systems
const UNSAFE_FILENAME_CHARS = /[/\\:*?"<>|\u0000-\u001f\u007f]/g;

/**
 * Cut a title to TITLE_MAX_LENGTH characters, marking the cut with "...".
 * Counts code points so surrogate pairs are never split.
 */
export function truncateTitle(title: string): string {
  const chars = Array.from(title.trim());
  if (chars.length <= TITLE_MAX_LENGTH) {
    return chars.join("");
  }
  return chars.slice(0, TITLE_MAX_LENGTH).join("") + "...";
}

export function sanitizeFileName(name: string): string {
  return name.replace(UNSAFE_FILENAME_CHARS, "_");
}

export function documentFileName(documentNumber: string, title: string): string {
  return sanitizeFileName(`${documentNumber} - ${truncateTitle(title)}.pdf`);
}

export function documentKey(
  parentFolder: string,
  agency: string,
  documentNumber: string,
  title: string
): string {
  return `${parentFolder}/${sanitizeFileName(agency)}/${documentFileName(documentNumber, title)}`;
}

export function indexKey(parentFolder: string): string {
  return `${parentFolder}/${INDEX_FILE_NAME}`;
}
