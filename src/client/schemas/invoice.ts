/**
 * invoice.ts: Zod schemas for invoices, their line items and totals.
 *
 * Dates travel as ISO strings (`YYYY-MM-DD` for calendar dates). A new
 * invoice defaults to today's date, NOK and DRAFT.
 */

import { z } from 'zod';
import { CustomFieldsSchema, IdSchema } from './common.js';

export const InvoiceStatusSchema = z.enum(['DRAFT', 'SENT', 'PAID', 'OVERDUE', 'CANCELLED', 'CREDITED']);

export type InvoiceStatus = z.infer<typeof InvoiceStatusSchema>;

export const InvoiceLineItemSchema = z.object({
  description: z.string(),
  quantity: z.number(),
  unit_price: z.number(),
  vat_rate: z.number().nullish(),
  discount: z.number().nullish(),
  product_id: z.string().nullish(),
  unit: z.string().nullish(),
  // Computed by the server
  line_total: z.number().nullish(),
  custom_fields: CustomFieldsSchema.nullish(),
});

export type InvoiceLineItem = z.infer<typeof InvoiceLineItemSchema>;

export const InvoiceTotalsSchema = z.object({
  subtotal: z.number(),
  vat_amount: z.number(),
  discount_amount: z.number().nullish(),
  total: z.number(),
});

export type InvoiceTotals = z.infer<typeof InvoiceTotalsSchema>;

export function today(): string {
  return new Date().toISOString().slice(0, 10);
}

export const InvoiceCreateSchema = z.object({
  customer_id: z.string().min(1),
  invoice_date: z.string().date().default(today),
  due_date: z.string().date().nullish(),
  line_items: z.array(InvoiceLineItemSchema).min(1),
  notes: z.string().nullish(),
  payment_terms: z.number().int().min(0).nullish(),
  currency: z.string().length(3).default('NOK'),
  reference: z.string().nullish(),
  status: InvoiceStatusSchema.default('DRAFT'),
  custom_fields: CustomFieldsSchema.nullish(),
});

export type InvoiceCreate = z.input<typeof InvoiceCreateSchema>;

export const InvoiceUpdateSchema = z.object({
  customer_id: z.string().min(1).optional(),
  invoice_date: z.string().date().optional(),
  due_date: z.string().date().nullish(),
  line_items: z.array(InvoiceLineItemSchema).min(1).optional(),
  notes: z.string().nullish(),
  payment_terms: z.number().int().min(0).nullish(),
  currency: z.string().length(3).optional(),
  reference: z.string().nullish(),
  status: InvoiceStatusSchema.optional(),
  custom_fields: CustomFieldsSchema.nullish(),
});

export type InvoiceUpdate = z.input<typeof InvoiceUpdateSchema>;

export const InvoiceSchema = z.object({
  id: IdSchema,
  invoice_number: z.string(),
  customer_id: z.string(),
  invoice_date: z.string(),
  due_date: z.string().nullish(),
  line_items: z.array(InvoiceLineItemSchema),
  notes: z.string().nullish(),
  payment_terms: z.number().int().nullish(),
  currency: z.string().default('NOK'),
  reference: z.string().nullish(),
  status: InvoiceStatusSchema.default('DRAFT'),
  custom_fields: CustomFieldsSchema.nullish(),
  created_at: z.string(),
  updated_at: z.string(),
  totals: InvoiceTotalsSchema,
  payment_date: z.string().nullish(),
  is_credit_note: z.boolean().default(false),
  credited_invoice_id: z.string().nullish(),
});

export type Invoice = z.infer<typeof InvoiceSchema>;
