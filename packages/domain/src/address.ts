import type { Secret } from '@payroute/masking';

/**
 * Postal details. Each field is independently optional: connectors decide
 * which ones they require and name the missing one when it is absent.
 */
export interface AddressDetails {
  line1?: Secret<string>;
  line2?: Secret<string>;
  line3?: Secret<string>;
  city?: string;
  state?: Secret<string>;
  country?: string;
  zip?: Secret<string>;
  firstName?: Secret<string>;
  lastName?: Secret<string>;
}

export interface PhoneDetails {
  number?: Secret<string>;
  countryCode?: string;
}

/**
 * `address: undefined` means no postal details were given;
 * `address: {}` means details were given and every field is empty.
 */
export interface Address {
  address?: AddressDetails;
  phone?: PhoneDetails;
}

export interface PaymentAddress {
  billing?: Address;
  shipping?: Address;
}
