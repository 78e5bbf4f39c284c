import { DEFAULT_HOME_COUNTRIES } from '../constants/export.js';
import type { Address } from '../types/graph.js';

/**
 * Whether the country is one of the home-country spellings (compared case-insensitively)
 */
export function isHomeCountry(country: string, homeCountries: readonly string[] = DEFAULT_HOME_COUNTRIES): boolean {
  const normalized = country.trim().toLowerCase();
  return normalized === '' || homeCountries.some((home) => home.trim().toLowerCase() === normalized);
}

/**
 * Multi-line postal block. The country line is left out for home-country addresses, empty lines
 * are dropped.
 */
export function formatAddress(address: Address, homeCountries: readonly string[] = DEFAULT_HOME_COUNTRIES): string {
  const lines = [address.address];
  if (address.addressSupplement) {
    lines.push(address.addressSupplement);
  }
  lines.push(address.postalCode ? `${address.postalCode} ${address.location}` : address.location);
  if (!isHomeCountry(address.country, homeCountries)) {
    lines.push(address.country);
  }
  return lines.filter((line) => line !== '').join('\n');
}
