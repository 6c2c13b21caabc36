import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { FakeTokenExchange, FakeTransport, silentLogger, TEST_CREDENTIALS } from '../../testing/fakes.js';
import { ValidationError } from '../errors.js';
import { So24Client } from '../So24Client.js';

function setup() {
  const transport = new FakeTransport();
  const client = new So24Client(TEST_CREDENTIALS, {
    transport,
    tokenExchange: new FakeTokenExchange(),
    logger: silentLogger(),
    rateLimitRate: null,
    retry: { baseDelayMs: 0, jitterMs: 0 },
  });
  return { client, transport };
}

const BatchBodySchema = z.object({ requests: z.array(z.object({ id: z.string() })) });

const customer = (id: number, name = `Customer ${id}`) => ({
  id,
  name,
  email: `post${id}@example.test`,
  created_at: '2026-01-01T00:00:00Z',
  updated_at: '2026-01-02T00:00:00Z',
});

const invoice = {
  id: '9',
  invoice_number: '10001',
  customer_id: 'c1',
  invoice_date: '2026-03-01',
  line_items: [{ description: 'Consulting', quantity: 2, unit_price: 1000 }],
  created_at: '2026-03-01T08:00:00Z',
  updated_at: '2026-03-01T08:00:00Z',
  totals: { subtotal: 2000, vat_amount: 500, total: 2500 },
  status: 'SENT',
};

describe('customers', () => {
  it('lists a page with search and decodes the records', async () => {
    const { client, transport } = setup();
    transport.reply({ body: { data: [customer(1), customer(2)] } });

    const page = await client.customers.list({ search: 'acme', pageSize: 2 });

    expect(page.page).toBe(1);
    expect(page.pageSize).toBe(2);
    expect(page.hasMore).toBe(true);
    expect(page.items.map((c) => c.id)).toEqual(['1', '2']);
    expect(page.items[0]?.is_active).toBe(true);
    expect(transport.requests[0]?.query).toEqual([
      ['page', '1'],
      ['pageSize', '2'],
      ['search', 'acme'],
    ]);
  });

  it('uses page 1 and 50 per page by default and omits an empty search', async () => {
    const { client, transport } = setup();
    transport.reply({ body: [] });

    const page = await client.customers.list();

    expect(page).toEqual({ items: [], page: 1, pageSize: 50, hasMore: false });
    expect(transport.requests[0]?.query).toEqual([
      ['page', '1'],
      ['pageSize', '50'],
    ]);
  });

  it('iterates every page with listAll', async () => {
    const { client, transport } = setup();
    transport.reply({ body: [customer(1), customer(2)] }, { body: [customer(3)] });

    const ids: string[] = [];
    for await (const record of client.customers.listAll({ pageSize: 2 })) ids.push(record.id);

    expect(ids).toEqual(['1', '2', '3']);
    expect(transport.requests.map((r) => r.query[0])).toEqual([
      ['page', '1'],
      ['page', '2'],
    ]);
  });

  it('validates a new customer before sending it', async () => {
    const { client, transport } = setup();

    await expect(client.customers.create({ name: 'Acme AS', email: 'nope' })).rejects.toThrow(
      'Invalid customer: email: Invalid email',
    );
    expect(transport.requests).toHaveLength(0);
  });

  it('creates, updates and deletes through the collection paths', async () => {
    const { client, transport } = setup();
    transport.reply({ status: 201, body: customer(7, 'Acme AS') }, { body: customer(7, 'Acme AS') }, { status: 204 });

    const created = await client.customers.create({ name: 'Acme AS', payment_terms: 14 });
    await client.customers.update('7', { notes: 'VIP' });
    await expect(client.customers.delete('7')).resolves.toBeUndefined();

    expect(created.name).toBe('Acme AS');
    expect(transport.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      'POST /customers',
      'PATCH /customers/7',
      'DELETE /customers/7',
    ]);
    expect(transport.requests[0]?.body).toEqual({ name: 'Acme AS', payment_terms: 14 });
    expect(transport.requests[1]?.body).toEqual({ notes: 'VIP' });
  });

  it('reports a record that does not decode', async () => {
    const { client, transport } = setup();
    transport.reply({ body: { id: '1', name: 'Acme AS' } });

    const error = await client.customers.get('1').catch((e: unknown) => e);
    expect(error).toBeInstanceOf(ValidationError);
    expect(error).toMatchObject({
      message: 'Invalid customer response: created_at: Required; updated_at: Required',
    });
  });

  it('escapes ids in the path', async () => {
    const { client, transport } = setup();
    transport.reply({ body: customer(1) });

    await client.customers.get('a/b');
    expect(transport.requests[0]?.path).toBe('/customers/a%2Fb');
  });

  it('fetches several records through one batch call', async () => {
    const { client, transport } = setup();
    transport.reply({
      body: {
        responses: [
          { id: '1', status: 200, body: customer(1) },
          { id: '2', status: 404, body: { message: 'Not found' } },
        ],
      },
    });

    const records = await client.customers.batchGet(['1', '2', '1']);

    expect([...records.keys()]).toEqual(['1']);
    expect(transport.requests[0]?.path).toBe('/batch');
    expect(transport.requests[0]?.body).toEqual({
      requests: [
        { id: '1', method: 'GET', path: '/customers/1' },
        { id: '2', method: 'GET', path: '/customers/2' },
      ],
    });
  });

  it('splits large batch reads into chunks of 20', async () => {
    const { client, transport } = setup();
    transport.replyAlways({ body: { responses: [] } });

    const ids = Array.from({ length: 25 }, (_, i) => String(i + 1));
    await client.customers.batchGet(ids);

    const sizes = transport.requests.map((r) => BatchBodySchema.parse(r.body).requests.length);
    expect(sizes).toEqual([20, 5]);
  });
});

describe('products', () => {
  it('drops cached reads after an update', async () => {
    const { client, transport } = setup();
    const product = (price: number) => ({
      id: 'p1',
      name: 'Hammer',
      price_info: { price },
      created_at: '2026-01-01T00:00:00Z',
      updated_at: '2026-01-01T00:00:00Z',
    });
    transport.reply({ body: product(100) }, { body: product(120) }, { body: product(120) });

    expect((await client.products.get('p1')).price_info?.price).toBe(100);
    expect((await client.products.get('p1')).price_info?.currency).toBe('NOK');
    await client.products.update('p1', { price_info: { price: 120 } });
    expect((await client.products.get('p1')).price_info?.price).toBe(120);

    expect(transport.requests).toHaveLength(3);
  });
});

describe('productCategories', () => {
  it('uses camelCase fields and treats a missing parent as top level', async () => {
    const { client, transport } = setup();
    transport.reply({ body: [{ id: 5, name: 'Tools', parentId: null }] }, { body: { id: 6, name: 'Saws', parentId: '5' } });

    const page = await client.productCategories.list();
    const created = await client.productCategories.create({ name: 'Saws', parentId: '5' });

    expect(page.items).toEqual([{ id: '5', name: 'Tools', parentId: 0 }]);
    expect(created.parentId).toBe(5);
    expect(transport.requests[0]?.path).toBe('/productcategories');
    expect(transport.requests[1]?.body).toEqual({ name: 'Saws', parentId: '5' });
  });

  it('defaults a new category to the top level', async () => {
    const { client, transport } = setup();
    transport.reply({ body: { id: 7, name: 'Misc' } });

    await client.productCategories.create({ name: 'Misc' });
    expect(transport.requests[0]?.body).toEqual({ name: 'Misc', parentId: '0' });
  });
});

describe('invoices', () => {
  it('filters by status and customer', async () => {
    const { client, transport } = setup();
    transport.reply({ body: [invoice] });

    const page = await client.invoices.list({ status: 'SENT', customerId: 'c1' });

    expect(page.items[0]?.totals.total).toBe(2500);
    expect(page.items[0]?.is_credit_note).toBe(false);
    expect(transport.requests[0]?.query).toEqual([
      ['customerId', 'c1'],
      ['page', '1'],
      ['pageSize', '50'],
      ['status', 'SENT'],
    ]);
  });

  it('fills invoice defaults on create', async () => {
    const { client, transport } = setup();
    transport.reply({ status: 201, body: invoice });

    await client.invoices.create({
      customer_id: 'c1',
      invoice_date: '2026-03-01',
      line_items: [{ description: 'Consulting', quantity: 2, unit_price: 1000 }],
    });

    expect(transport.requests[0]?.body).toEqual({
      customer_id: 'c1',
      invoice_date: '2026-03-01',
      line_items: [{ description: 'Consulting', quantity: 2, unit_price: 1000 }],
      currency: 'NOK',
      status: 'DRAFT',
    });
  });

  it('rejects an invoice without line items', async () => {
    const { client } = setup();
    await expect(client.invoices.create({ customer_id: 'c1', line_items: [] })).rejects.toThrow(
      'Invalid invoice: line_items: Array must contain at least 1 element(s)',
    );
  });

  it('posts lifecycle actions under the invoice path', async () => {
    const { client, transport } = setup();
    transport.replyAlways({ body: invoice });

    await client.invoices.send('9');
    await client.invoices.markAsPaid('9', '2026-03-20');
    await client.invoices.markAsPaid('9');
    await client.invoices.createCreditNote('9');

    expect(transport.requests.map((r) => `${r.method} ${r.path}`)).toEqual([
      'POST /invoices/9/send',
      'POST /invoices/9/mark-paid',
      'POST /invoices/9/mark-paid',
      'POST /invoices/9/credit',
    ]);
    expect(transport.requests[1]?.body).toEqual({ paymentDate: '2026-03-20' });
    expect(transport.requests[2]?.body).toEqual({});
  });

  it('rejects a payment date that is not ISO formatted', async () => {
    const { client, transport } = setup();
    await expect(client.invoices.markAsPaid('9', '20.03.2026')).rejects.toBeInstanceOf(ValidationError);
    expect(transport.requests).toHaveLength(0);
  });
});
