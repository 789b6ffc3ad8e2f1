import type { ApiKeyConfig } from "@/auth/types";
import type { CorsConfig } from "@/cors/types";
import type { ValidationIssue } from "@/utils/errors";

export interface RestConfig {
  host?: string;
  port?: number;
  diagnostics?: boolean;
  /** GET /status health check (default: true) */
  enableStatus?: boolean;
  /** GET /schema with the JSON Schema of every task action (default: true) */
  enableSchema?: boolean;
  allowedOrigins: string[];
  cors?: CorsConfig;
  /** Gate in front of the v2 routes */
  apiKey: ApiKeyConfig;
}

/** Body of every failed request */
export type ErrorBody = {
  detail: string;
  errors?: ValidationIssue[];
};

/** HTTP status per error kind */
export type ErrorStatus = 400 | 401 | 404 | 422 | 500;
