/**
 * Compiled-in extension table. Order matters: the first category listing an
 * extension wins.
 */

export interface Category {
  name: string;
  extensions: ReadonlySet<string>;
}

export type CategoryTable = readonly Category[];

export const FALLBACK_CATEGORY = 'Other';

function category(name: string, extensions: string[]): Category {
  return { name, extensions: new Set(extensions) };
}

export const CATEGORY_TABLE: CategoryTable = Object.freeze([
  category('Images', ['.jpg', '.jpeg', '.png', '.gif', '.bmp', '.tiff', '.svg']),
  category('Documents', ['.pdf', '.doc', '.docx', '.txt', '.rtf', '.xls', '.xlsx', '.ppt', '.pptx']),
  category('Audio', ['.mp3', '.wav', '.ogg', '.aac', '.flac']),
  category('Video', ['.mp4', '.mov', '.avi', '.mkv', '.wmv']),
  category('Archives', ['.zip', '.tar', '.gz', '.rar', '.7z']),
  category('Code', ['.py', '.js', '.html', '.css', '.c', '.cpp', '.java', '.php', '.rb', '.go']),
]);

export function listCategoryNames(table: CategoryTable = CATEGORY_TABLE): string[] {
  return [...table.map(entry => entry.name), FALLBACK_CATEGORY];
}

/**
 * Extensions claimed by more than one category, mapped to every claimant in table order.
 */
export function findDuplicateExtensions(table: CategoryTable = CATEGORY_TABLE): Map<string, string[]> {
  const owners = new Map<string, string[]>();
  for (const entry of table) {
    for (const extension of entry.extensions) {
      owners.set(extension, [...(owners.get(extension) ?? []), entry.name]);
    }
  }

  const duplicates = new Map<string, string[]>();
  for (const [extension, names] of owners) {
    if (names.length > 1) duplicates.set(extension, names);
  }
  return duplicates;
}
