/**
 * Lower-case the text, then upper-case the first letter of every word.
 * "LEV ATM ELEC LISBOA" becomes "Lev Atm Elec Lisboa".
 */
export function capitalizeWords(message: string): string {
  return message.toLowerCase().replace(/\b\w/g, (letter) => letter.toUpperCase());
}

/**
 * 32-bit string hash (31 multiplier), stable across runs.
 */
export function hashString(value: string): number {
  let hash = 0;
  for (let i = 0; i < value.length; i++) {
    hash = (Math.imul(31, hash) + value.charCodeAt(i)) | 0;
  }
  return hash;
}
