/**
 * Observation Validator
 *
 * Sole gatekeeper in front of the store. Rules run in order and the first
 * failure wins: symbol, then price, then atr. Values pass through unchanged.
 */

import { z } from 'zod';
import { ValidationError } from '../../../common/errors.js';
import type { ObservationCandidate } from '../contracts/observation.types.js';

// Plain decimal or exponent notation; no hex, binary, octal or `Infinity`
const DECIMAL = /^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/;

// TradingView sends `{{close}}` unquoted, but templates are often quoted.
const toNumber = (value: unknown): unknown => {
  if (typeof value !== 'string') return value;
  const text = value.trim();
  return DECIMAL.test(text) ? Number(text) : value;
};

const SymbolSchema = z.string().refine(s => s.trim().length > 0);
const PriceSchema = z.preprocess(toNumber, z.number().finite().gt(0));
const AtrSchema = z.preprocess(toNumber, z.number().finite().gte(0));

export function validateObservation(
  rawSymbol: unknown,
  rawPrice: unknown,
  rawAtr: unknown,
): ObservationCandidate {
  const symbol = SymbolSchema.safeParse(rawSymbol);
  if (!symbol.success) {
    throw new ValidationError('missing symbol');
  }

  const price = PriceSchema.safeParse(rawPrice);
  if (!price.success) {
    throw new ValidationError('invalid price');
  }

  const atr = AtrSchema.safeParse(rawAtr);
  if (!atr.success) {
    throw new ValidationError('invalid atr');
  }

  return { symbol: symbol.data, price: price.data, atr: atr.data };
}

export function exitPrice(obs: ObservationCandidate): number {
  return obs.price - obs.atr;
}
