// src/utils/numeric.ts

import { PRESSURE_EXPONENT_BIAS, PRESSURE_ZERO_EXPONENT } from '../constants/constants.js';
import { GaugeDataConversionError } from '../errors.js';

const PRESSURE_CODE_PATTERN = /^\d{6}$/;
const CALIBRATION_CODE_PATTERN = /^\d+$/;

/** Digits kept in the pressure mantissa */
const MANTISSA_DIGITS = 4;

/**
 * Splits a positive finite number into its normalized mantissa digits and decimal
 * exponent, rounded to four significant digits.
 * @returns `[digits, exponent]`, e.g. `1.23e-3 -> ['1230', -3]`
 */
function normalize(value: number): [string, number] {
  const [mantissa = '', exponent = '0'] = value.toExponential(MANTISSA_DIGITS - 1).split('e');
  return [mantissa.replace('.', ''), Number(exponent)];
}

/**
 * Decimal exponent of a number in scientific normalization (mantissa in [1, 10)).
 * Zero maps to -1.
 * @throws GaugeDataConversionError for NaN and infinite values
 */
export function exponentOf(value: number): number {
  if (!Number.isFinite(value)) {
    throw new GaugeDataConversionError(value, 'finite number');
  }
  if (value === 0) return PRESSURE_ZERO_EXPONENT;
  return normalize(Math.abs(value))[1];
}

/**
 * Mantissa of a number in scientific normalization, in [1, 10), rounded to four
 * significant digits. Zero maps to 0.
 * @throws GaugeDataConversionError for NaN and infinite values
 */
export function mantissaOf(value: number): number {
  if (!Number.isFinite(value)) {
    throw new GaugeDataConversionError(value, 'finite number');
  }
  if (value === 0) return 0;
  const [digits] = normalize(Math.abs(value));
  return (Math.sign(value) * Number(digits)) / 1000;
}

/**
 * Encodes a pressure as 6 ASCII digits: 4-digit mantissa followed by the
 * exponent biased by 20. Zero encodes as `000019`.
 * @param value - Pressure, non-negative
 * @returns Pressure code, e.g. `1.23e-3 -> '123017'`
 * @throws GaugeDataConversionError for negative or non-finite values, or when the
 * biased exponent does not fit two digits
 */
export function pressureEncode(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new GaugeDataConversionError(value, 'non-negative finite pressure');
  }
  if (value === 0) {
    return `${'0'.repeat(MANTISSA_DIGITS)}${PRESSURE_ZERO_EXPONENT + PRESSURE_EXPONENT_BIAS}`;
  }
  const [digits, exponent] = normalize(value);
  const biased = exponent + PRESSURE_EXPONENT_BIAS;
  if (biased < 0 || biased > 99) {
    throw new GaugeDataConversionError(value, 'pressure between 1e-20 and 9.999e79');
  }
  return `${digits}${String(biased).padStart(2, '0')}`;
}

/**
 * Decodes a 6-digit pressure code.
 * @returns Pressure, or null when the code is not exactly six decimal digits
 */
export function pressureDecode(code: string): number | null {
  if (!PRESSURE_CODE_PATTERN.test(code)) return null;
  const mantissa = Number(code.slice(0, MANTISSA_DIGITS));
  const power = Number(code.slice(MANTISSA_DIGITS)) - PRESSURE_EXPONENT_BIAS - (MANTISSA_DIGITS - 1);
  // Dividing by an exact power of ten keeps results such as 0.001234 exact
  return power < 0 ? mantissa / 10 ** -power : mantissa * 10 ** power;
}

/**
 * Encodes a calibration factor as the decimal string of `round(value * 100)`,
 * rounding half up and without padding: `1.23 -> '123'`, `0.995 -> '100'`.
 * @throws GaugeDataConversionError for negative or non-finite values
 */
export function calibrationEncode(value: number): string {
  if (!Number.isFinite(value) || value < 0) {
    throw new GaugeDataConversionError(value, 'non-negative finite calibration factor');
  }
  // Scale through a 12-digit decimal form so 0.995 rounds as 99.5 rather than 99.4999...
  const scaled = Number((value * 100).toPrecision(12));
  return String(Math.round(scaled));
}

/**
 * Decodes a calibration code.
 * @returns Calibration factor, or null for empty or non-digit input
 */
export function calibrationDecode(code: string): number | null {
  if (!CALIBRATION_CODE_PATTERN.test(code)) return null;
  return Number(code) / 100;
}

/**
 * Splits an unsigned 32-bit value into two 16-bit words, high word first.
 */
export function splitUint32(value: number): [number, number] {
  const v = value >>> 0;
  return [Math.floor(v / 0x10000), v & 0xffff];
}

/**
 * Combines two 16-bit words, high word first, into an unsigned 32-bit value.
 */
export function combineUint32(high: number, low: number): number {
  return (high & 0xffff) * 0x10000 + (low & 0xffff);
}
