/**
 * Typed facade over the Domeneshop API resources.
 *
 * Each method is exactly one HTTP call. Responses are passed through as the
 * API returns them; the types document the wire shape.
 */

import type { ApiFetchConfig, ApiRequest, FetchFn, HttpMethod } from './http.js';
import { apiFetch } from './http.js';
import type {
  Credentials,
  DnsRecord,
  DnsRecordInput,
  DnsRecordType,
  Domain,
  Forward,
  Invoice,
  InvoiceStatus,
} from './types.js';

export interface ClientOptions {
  baseUrl: string;
  timeoutMs: number;
  fetch?: FetchFn;
}

export class DomeneshopClient {
  private readonly config: ApiFetchConfig;

  constructor(credentials: Credentials, options: ClientOptions) {
    this.config = {
      baseUrl: options.baseUrl,
      timeoutMs: options.timeoutMs,
      credentials: { token: credentials.token, secret: credentials.secret },
      fetch: options.fetch,
    };
  }

  /** Raw call against any API path. */
  call(method: HttpMethod, path: string, request: ApiRequest = {}): Promise<unknown> {
    return apiFetch(method, path, request, this.config);
  }

  private async request<T>(method: HttpMethod, path: string, request: ApiRequest = {}): Promise<T> {
    return (await this.call(method, path, request)) as T;
  }

  // Domains

  listDomains(filter?: string): Promise<Domain[]> {
    return this.request('GET', '/domains', { query: { domain: filter } });
  }

  getDomain(domainId: number): Promise<Domain> {
    return this.request('GET', `/domains/${domainId}`);
  }

  // DNS

  listDnsRecords(
    domainId: number,
    filter: { host?: string; type?: DnsRecordType } = {},
  ): Promise<DnsRecord[]> {
    return this.request('GET', `/domains/${domainId}/dns`, {
      query: { host: filter.host, type: filter.type },
    });
  }

  getDnsRecord(domainId: number, recordId: number): Promise<DnsRecord> {
    return this.request('GET', `/domains/${domainId}/dns/${recordId}`);
  }

  createDnsRecord(domainId: number, record: DnsRecordInput): Promise<{ id: number }> {
    return this.request('POST', `/domains/${domainId}/dns`, { body: record });
  }

  async updateDnsRecord(domainId: number, recordId: number, record: DnsRecordInput): Promise<void> {
    await this.call('PUT', `/domains/${domainId}/dns/${recordId}`, { body: record });
  }

  async deleteDnsRecord(domainId: number, recordId: number): Promise<void> {
    await this.call('DELETE', `/domains/${domainId}/dns/${recordId}`);
  }

  // Forwards

  listForwards(domainId: number): Promise<Forward[]> {
    return this.request('GET', `/domains/${domainId}/forwards/`);
  }

  getForward(domainId: number, host: string): Promise<Forward> {
    return this.request('GET', `/domains/${domainId}/forwards/${encodeURIComponent(host)}`);
  }

  async createForward(domainId: number, forward: Forward): Promise<void> {
    await this.call('POST', `/domains/${domainId}/forwards/`, { body: forward });
  }

  async updateForward(domainId: number, host: string, forward: Forward): Promise<void> {
    await this.call('PUT', `/domains/${domainId}/forwards/${encodeURIComponent(host)}`, {
      body: forward,
    });
  }

  async deleteForward(domainId: number, host: string): Promise<void> {
    await this.call('DELETE', `/domains/${domainId}/forwards/${encodeURIComponent(host)}`);
  }

  // Invoices

  listInvoices(status?: InvoiceStatus): Promise<Invoice[]> {
    return this.request('GET', '/invoices', { query: { status } });
  }

  getInvoice(invoiceId: number): Promise<Invoice> {
    return this.request('GET', `/invoices/${invoiceId}`);
  }

  // Dynamic DNS

  async updateDynDns(hostname: string, myip?: string): Promise<void> {
    await this.call('GET', '/dyndns/update', { query: { hostname, myip } });
  }
}
