import { describe, it, expect } from 'vitest';
import type { Address } from '../types/graph.js';
import { formatAddress, isHomeCountry } from './address.js';

const address = (overrides: Partial<Address>): Address => ({
  address: 'Example Street 1',
  addressSupplement: '',
  postalCode: '12345',
  location: 'Sampletown',
  country: '',
  ...overrides,
});

describe('isHomeCountry', () => {
  it('matches home spellings case-insensitively', () => {
    expect(isHomeCountry('germany')).toBe(true);
    expect(isHomeCountry(' DE ')).toBe(true);
    expect(isHomeCountry('')).toBe(true);
    expect(isHomeCountry('France')).toBe(false);
  });

  it('takes a custom list', () => {
    expect(isHomeCountry('AT', ['AT', 'Austria'])).toBe(true);
    expect(isHomeCountry('DE', ['AT', 'Austria'])).toBe(false);
  });
});

describe('formatAddress', () => {
  it('leaves out the country of domestic addresses', () => {
    expect(formatAddress(address({ country: 'Deutschland' }))).toBe('Example Street 1\n12345 Sampletown');
  });

  it('adds supplement and foreign country lines', () => {
    expect(formatAddress(address({ addressSupplement: 'c/o Test', country: 'France' }))).toBe(
      'Example Street 1\nc/o Test\n12345 Sampletown\nFrance'
    );
  });

  it('drops empty lines', () => {
    expect(formatAddress(address({ address: '', postalCode: '', location: '' }))).toBe('');
  });

  it('prints the location alone without postal code', () => {
    expect(formatAddress(address({ postalCode: '' }))).toBe('Example Street 1\nSampletown');
  });
});
