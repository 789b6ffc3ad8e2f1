import type { Hono } from "hono";
import { cors } from "hono/cors";
import { DEFAULT_API_KEY_HEADER } from "@/auth/api-key-gate";
import type { RestConfig } from "@/rest/types";
import type { CorsOptions } from "./types";

/**
 * Build default CORS options from REST config.
 * An empty allowedOrigins list allows any origin.
 */
export const buildDefaultCorsOptions = (config: RestConfig): CorsOptions => {
  const getDefaultOrigin = (reqOrigin: string) => {
    if (config.allowedOrigins.length > 0) {
      return config.allowedOrigins.includes(reqOrigin) ? reqOrigin : "";
    }
    return "*";
  };

  return {
    origin: getDefaultOrigin,
    credentials: false,
    allowHeaders: [
      "Content-Type",
      config.apiKey.headerName ?? DEFAULT_API_KEY_HEADER,
    ],
    allowMethods: ["GET", "POST", "PATCH", "DELETE", "OPTIONS"],
    exposeHeaders: ["Content-Length"],
    maxAge: 600,
    ...config.cors?.defaults,
  };
};

/**
 * Apply CORS configuration to a Hono app based on RestConfig.
 * Must run before any gate so preflight requests are answered without a key.
 */
export const applyCorsConfig = (app: Hono, config: RestConfig): void => {
  const corsEnabled = config.cors?.enabled ?? "default";

  if (corsEnabled === false) {
    return;
  }

  app.use("*", cors(buildDefaultCorsOptions(config)));
};
