// Pincode helpers. Pincodes are fixed-width digit strings; leading zeros are significant.

const PINCODE_LENGTH = 6;

const STANDALONE_PINCODE = /\b\d{6}\b/;
const SPLIT_PINCODE = /\b\d{3}[\s-]?\d{3}\b/;

/**
 * Strips every non-digit and keeps the result only when exactly six digits remain.
 */
export function cleanPincode(raw: string | null | undefined): string {
  if (raw === null || raw === undefined) {
    return '';
  }

  const digitsOnly = String(raw).trim().replace(/\D/g, '');
  return digitsOnly.length === PINCODE_LENGTH ? digitsOnly : '';
}

/**
 * Finds a pincode inside free text: a standalone six-digit run first,
 * then a 3+3 form split by a space or hyphen (e.g. "110 001", "110-001").
 */
export function extractPincodeFromText(text: string | null | undefined): string {
  if (text === null || text === undefined) {
    return '';
  }

  const value = String(text);

  const standalone = STANDALONE_PINCODE.exec(value);
  if (standalone) {
    return standalone[0];
  }

  const split = SPLIT_PINCODE.exec(value);
  if (split) {
    return split[0].replace(/[\s-]/g, '');
  }

  return '';
}
