/**
 * customer.ts: Zod schemas for customers.
 *
 * Wire fields are snake_case and kept as-is. `CustomerCreateSchema` and
 * `CustomerUpdateSchema` validate outgoing payloads; `CustomerSchema` decodes
 * records returned by the API.
 */

import { z } from 'zod';
import { CustomFieldsSchema, IdSchema } from './common.js';

export const AddressSchema = z.object({
  street: z.string().nullish(),
  city: z.string().nullish(),
  postal_code: z.string().nullish(),
  country: z.string().nullish(),
  /** "Shipping", "Billing", ... */
  type: z.string().nullish(),
});

export type Address = z.infer<typeof AddressSchema>;

export const ContactSchema = z.object({
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
  email: z.string().email().nullish(),
  phone: z.string().nullish(),
  position: z.string().nullish(),
});

export type Contact = z.infer<typeof ContactSchema>;

const customerFields = {
  name: z.string().min(1),
  email: z.string().email().nullish(),
  phone: z.string().nullish(),
  website: z.string().nullish(),
  tax_id: z.string().nullish(),
  notes: z.string().nullish(),
  customer_number: z.string().nullish(),
  currency: z.string().length(3).nullish(),
  /** Days. */
  payment_terms: z.number().int().min(0).nullish(),
  addresses: z.array(AddressSchema).nullish(),
  contacts: z.array(ContactSchema).nullish(),
  custom_fields: CustomFieldsSchema.nullish(),
};

export const CustomerCreateSchema = z.object(customerFields);

export type CustomerCreate = z.input<typeof CustomerCreateSchema>;

export const CustomerUpdateSchema = z
  .object({ ...customerFields, name: customerFields.name.optional() })
  .omit({ customer_number: true });

export type CustomerUpdate = z.input<typeof CustomerUpdateSchema>;

export const CustomerSchema = z.object({
  ...customerFields,
  id: IdSchema,
  created_at: z.string(),
  updated_at: z.string(),
  is_active: z.boolean().default(true),
});

export type Customer = z.infer<typeof CustomerSchema>;
