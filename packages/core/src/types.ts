/**
 * Resource shapes returned by the Domeneshop API (v0).
 *
 * Field names follow the wire format. The API owns every one of these;
 * nothing here is stored locally.
 */

export const DNS_RECORD_TYPES = ['A', 'AAAA', 'CNAME', 'MX', 'TXT', 'SRV'] as const;
export type DnsRecordType = (typeof DNS_RECORD_TYPES)[number];

export const INVOICE_STATUSES = ['unpaid', 'paid', 'settled'] as const;
export type InvoiceStatus = (typeof INVOICE_STATUSES)[number];

export interface DomainServices {
  registrar: boolean;
  dns: boolean;
  email: boolean;
  webhotel: string;
}

export interface Domain {
  id: number;
  domain: string;
  expiry_date: string;
  registered_date?: string;
  renew: boolean;
  registrant: string;
  status: string;
  nameservers?: string[];
  services?: DomainServices;
}

/** A DNS record as submitted to the API (no id). */
export interface DnsRecordInput {
  type: DnsRecordType;
  host: string;
  data: string;
  ttl: number;
  priority?: number;
  weight?: number;
  port?: number;
}

export interface DnsRecord extends DnsRecordInput {
  id: number;
}

export interface Forward {
  host: string;
  url: string;
  frame: boolean;
}

export interface Invoice {
  id: number;
  type: string;
  amount: number;
  currency: string;
  due_date?: string | null;
  issued_date: string;
  paid_date?: string | null;
  status: InvoiceStatus;
  url: string;
}

export type CredentialSource = 'environment' | 'keychain' | 'file' | 'interactive';

export interface Credentials {
  token: string;
  secret: string;
}

export interface ResolvedCredentials extends Credentials {
  source: CredentialSource;
  /** Account name the pair was stored under, when it came from an account. */
  account?: string;
}
