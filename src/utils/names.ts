/**
 * Name views
 *
 * Each view has its own purpose and they are not interchangeable:
 * - common: running text and default display
 * - salutation: direct address in letters
 * - legal: formal documents (certificates, receipts)
 * - nametag: printed badges, display name big and the full name below
 * - organizational: orga lists, full given names with the display name in parentheses
 */

import type { Name } from '../types/graph.js';

function join(...parts: string[]): string {
  return parts.filter((part) => part !== '').join(' ');
}

function hasDistinctDisplayName(name: Name): boolean {
  return name.displayName !== '' && name.displayName !== name.givenNames;
}

export function commonForename(name: Name): string {
  return name.displayName !== '' && name.givenNames.includes(name.displayName) ? name.displayName : name.givenNames;
}

export function common(name: Name): string {
  return join(commonForename(name), name.familyName);
}

export function salutation(name: Name): string {
  return name.displayName || name.givenNames;
}

export function legal(name: Name): string {
  return join(name.title, name.givenNames, name.familyName, name.nameSupplement);
}

export function nametagForename(name: Name): string {
  return name.displayName || name.givenNames;
}

export function nametagSurname(name: Name): string {
  return hasDistinctDisplayName(name) ? join(name.givenNames, name.familyName) : name.familyName;
}

export function nametag(name: Name): string {
  return join(nametagForename(name), nametagSurname(name));
}

export function organizationalForename(name: Name): string {
  return hasDistinctDisplayName(name) ? `${name.givenNames} (${name.displayName})` : name.givenNames;
}

export function organizational(name: Name): string {
  return join(organizationalForename(name), name.familyName);
}
