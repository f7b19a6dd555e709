import { basename } from 'path';
import { CATEGORY_TABLE, FALLBACK_CATEGORY } from './categories.js';
import type { CategoryTable } from './categories.js';

/**
 * Lowercased final suffix of a file name, including the dot. Dotfiles such as
 * `.bashrc` and names ending in a bare dot have no extension.
 */
export function getExtension(fileName: string): string {
  const name = basename(fileName);
  const dot = name.lastIndexOf('.');
  if (dot <= 0 || dot === name.length - 1) {
    return '';
  }
  return name.slice(dot).toLowerCase();
}

export function categorize(fileName: string, table: CategoryTable = CATEGORY_TABLE): string {
  const extension = getExtension(fileName);
  if (!extension) return FALLBACK_CATEGORY;

  const match = table.find(entry => entry.extensions.has(extension));
  return match ? match.name : FALLBACK_CATEGORY;
}
