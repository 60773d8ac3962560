/**
 * Taxpayer id (CNPJ) validation
 * Format: 99.999.999/9999-99 (14 digits, last two are modulus-11 check digits)
 */

const FIRST_DIGIT_WEIGHTS = [5, 4, 3, 2, 9, 8, 7, 6, 5, 4, 3, 2]
const SECOND_DIGIT_WEIGHTS = [6, ...FIRST_DIGIT_WEIGHTS]

/**
 * Strip everything but digits
 */
export function taxpayerIdDigits(value: unknown): string {
  return String(value ?? '').replace(/\D/g, '')
}

/**
 * Compute a check digit over the leading digits
 */
function checkDigit(digits: string, weights: readonly number[]): number {
  let sum = 0
  for (let i = 0; i < weights.length; i++) {
    sum += Number(digits[i]) * weights[i]
  }

  const remainder = sum % 11
  return remainder < 2 ? 0 : 11 - remainder
}

/**
 * Validate a taxpayer id
 * @param value Id in any formatting (punctuation is ignored), string or number
 * @returns true if both check digits match
 */
export function isValidTaxpayerId(value: unknown): boolean {
  const digits = taxpayerIdDigits(value)

  // Repeated digits (e.g. 00000000000000) pass the checksum but are placeholders
  if (digits.length !== 14 || /^(\d)\1{13}$/.test(digits)) return false

  if (checkDigit(digits, FIRST_DIGIT_WEIGHTS) !== Number(digits[12])) return false

  return checkDigit(digits, SECOND_DIGIT_WEIGHTS) === Number(digits[13])
}
