import type { PaginatedResult } from '../paginate.js';
import { ValidationError } from '../errors.js';
import {
  InvoiceCreateSchema,
  InvoiceSchema,
  InvoiceStatusSchema,
  InvoiceUpdateSchema,
  type Invoice,
  type InvoiceCreate,
  type InvoiceStatus,
  type InvoiceUpdate,
} from '../schemas/invoice.js';
import { ResourceEndpoint, type ApiRequester, type ListParams } from './base.js';

export interface InvoiceListParams extends ListParams {
  status?: InvoiceStatus;
  customerId?: string;
}

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

/**
 * InvoicesResource: invoice CRUD plus the lifecycle actions. Every action is
 * a POST under the invoice's path, so it invalidates cached invoice reads.
 */
export class InvoicesResource extends ResourceEndpoint<Invoice, InvoiceCreate, InvoiceUpdate> {
  constructor(client: ApiRequester) {
    super(client, '/invoices', 'invoice', {
      record: InvoiceSchema,
      create: InvoiceCreateSchema,
      update: InvoiceUpdateSchema,
    });
  }

  override list(params: InvoiceListParams = {}): Promise<PaginatedResult<Invoice>> {
    if (params.status !== undefined && !InvoiceStatusSchema.safeParse(params.status).success) {
      return Promise.reject(new ValidationError(`Invalid invoice status: ${params.status}`));
    }
    return super.list(params);
  }

  /** Sends the invoice to the customer; the returned invoice is SENT. */
  async send(id: string): Promise<Invoice> {
    return this.decode(await this.client.request('POST', this.itemPath(id, 'send')));
  }

  /** `paymentDate` is `YYYY-MM-DD`; the server uses today when it is omitted. */
  async markAsPaid(id: string, paymentDate?: string): Promise<Invoice> {
    if (paymentDate !== undefined && !ISO_DATE.test(paymentDate)) {
      throw new ValidationError(`Invalid payment date: ${paymentDate} (expected YYYY-MM-DD)`);
    }
    const body = paymentDate === undefined ? {} : { paymentDate };
    return this.decode(await this.client.request('POST', this.itemPath(id, 'mark-paid'), { body }));
  }

  /** Issues a credit note against the invoice and returns the credit note. */
  async createCreditNote(id: string): Promise<Invoice> {
    return this.decode(await this.client.request('POST', this.itemPath(id, 'credit')));
  }
}
