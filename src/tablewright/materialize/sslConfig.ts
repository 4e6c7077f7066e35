// materialize/sslConfig.ts

import type { ConnectionOptions } from "node:tls";

export type SSLConfigOptions = {
  NODE_ENV?: string;
  allowSSL?: boolean;
  rejectUnauthorized?: boolean;
  dbUrl?: string;
};

export type SSLConfig = ConnectionOptions | false;

export function getSSLConfig(opts: SSLConfigOptions = {}): SSLConfig {
  const { NODE_ENV = "development", allowSSL, rejectUnauthorized, dbUrl } = opts;

  if (typeof allowSSL === "boolean") {
    return allowSSL ? { rejectUnauthorized: rejectUnauthorized ?? false } : false;
  }

  // sslmode=require or ssl=true in the URL
  const lower = (dbUrl || "").toLowerCase();
  if (lower.includes("sslmode=require") || lower.includes("ssl=true")) {
    return { rejectUnauthorized: rejectUnauthorized ?? false };
  }

  if (NODE_ENV === "production") {
    return { rejectUnauthorized: rejectUnauthorized ?? true };
  }

  // dev/test: no SSL
  return false;
}
