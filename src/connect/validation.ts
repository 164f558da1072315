import { z } from 'zod';
import type { ClientForm } from './types.js';

const FILL_ALL_FIELDS = 'Preencha todos os campos.';

export const ClientFormSchema = z.object({
  name: z
    .string({ required_error: FILL_ALL_FIELDS, invalid_type_error: FILL_ALL_FIELDS })
    .trim()
    .min(1, FILL_ALL_FIELDS),
  email: z
    .string({ required_error: FILL_ALL_FIELDS, invalid_type_error: FILL_ALL_FIELDS })
    .trim()
    .min(1, FILL_ALL_FIELDS)
    .refine(v => v.includes('@') && v.includes('.'), 'Informe um e-mail válido.'),
}, { invalid_type_error: FILL_ALL_FIELDS });

export const ItemIdSchema = z
  .string({ required_error: 'itemId ausente.', invalid_type_error: 'itemId ausente.' })
  .trim()
  .min(1, 'itemId ausente.');

/**
 * Form input rejected before any external call.
 * `fields` names the offending inputs; `message` is user-safe.
 */
export class ValidationError extends Error {
  readonly fields: string[];

  constructor(message: string, fields: string[]) {
    super(message);
    this.name = 'ValidationError';
    this.fields = fields;
  }
}

function toValidationError(error: z.ZodError, fallbackField: string): ValidationError {
  const fields = [...new Set(error.issues.map(i => String(i.path[0] ?? fallbackField)))];
  return new ValidationError(error.issues[0]?.message ?? FILL_ALL_FIELDS, fields);
}

/**
 * @throws ValidationError when name is blank or email is malformed
 */
export function parseClientForm(input: unknown): ClientForm {
  const parsed = ClientFormSchema.safeParse(input ?? {});
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'form');
  }
  return parsed.data;
}

/**
 * @throws ValidationError when the item id is missing or blank
 */
export function parseItemId(input: unknown): string {
  const parsed = ItemIdSchema.safeParse(input);
  if (!parsed.success) {
    throw toValidationError(parsed.error, 'itemId');
  }
  return parsed.data;
}
