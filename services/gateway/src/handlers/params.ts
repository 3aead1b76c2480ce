/**
 * Parameter parsing for handlers.
 *
 * zod checks shape and fills defaults; its first issue is mapped onto the
 * error taxonomy:
 * - missing required value       → ValidationError `Missing required parameter: <field>`
 * - value of the wrong JSON type → InvalidParamsError
 * - anything else (range, format) → ValidationError with the schema's message
 *
 * Both carry `data.field`.
 */

import { z } from 'zod';
import { GatewayError, JsonRpcParams, invalidParams, validationError } from '@btc-gateway/types';
import { isValidBitcoinAddress, isValidBlockHeight, isValidHash, MAX_BLOCK_HEIGHT } from '../validation/bitcoin-validators';

function describeReceived(issue: z.ZodInvalidTypeIssue): string {
  return issue.received === 'float' ? 'a non-integer number' : issue.received;
}

export function toParamsError(error: z.ZodError): GatewayError {
  const [issue] = error.issues;
  if (!issue) {
    return invalidParams('Invalid params');
  }
  const field = issue.path.length > 0 ? issue.path.join('.') : undefined;

  if (issue.code === z.ZodIssueCode.invalid_type) {
    if (issue.received === z.ZodParsedType.undefined) {
      return validationError(`Missing required parameter: ${field ?? 'params'}`, field);
    }
    return invalidParams(
      `Invalid type for ${field ?? 'params'}: expected ${issue.expected}, received ${describeReceived(issue)}`,
      field
    );
  }

  return validationError(issue.message, field);
}

/**
 * Validate a params mapping against a handler's schema.
 *
 * @throws GatewayError of kind InvalidParamsError or ValidationError
 */
export function parseParams<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, params: JsonRpcParams): T {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    throw toParamsError(parsed.error);
  }
  return parsed.data;
}

// =============================================================================
// Shared parameter schemas
// =============================================================================

export const AddressParam = z
  .string()
  .refine(isValidBitcoinAddress, (address) => ({ message: `Invalid Bitcoin address: ${address}` }));

export const BlockHeightParam = z
  .number()
  .int()
  .refine(isValidBlockHeight, (height) => ({
    message: `Invalid block height: ${height} (expected 0-${MAX_BLOCK_HEIGHT})`,
  }));

export function hashParam(label: string) {
  return z.string().refine(isValidHash, (hash) => ({ message: `Invalid ${label}: ${hash}` }));
}

export function boundedInt(min: number, max: number, label: string) {
  const message = `${label} must be between ${min} and ${max}`;
  return z.number().int().min(min, message).max(max, message);
}

export const CurrencyParam = z
  .string()
  .regex(/^[a-zA-Z]{2,10}$/, 'currency must be a currency code such as usd or eur')
  .transform((currency) => currency.toLowerCase());
