export { ResourceEndpoint } from './base.js';
export type { ApiRequester, ListParams, RequestOptions, ResourceSchemas } from './base.js';
export { CustomersResource } from './customers.js';
export { InvoicesResource } from './invoices.js';
export type { InvoiceListParams } from './invoices.js';
export { ProductCategoriesResource } from './product-categories.js';
export { ProductsResource } from './products.js';
