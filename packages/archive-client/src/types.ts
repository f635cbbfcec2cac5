export type TokenSupplier = string | (() => string | null | Promise<string | null>);

export interface ArchiveClientOptions {
  baseUrl: string;
  instrument: string;
  token?: TokenSupplier;
  defaultHeaders?: Record<string, string>;
  userAgent?: string;
  fetchTimeoutMs?: number;
}
