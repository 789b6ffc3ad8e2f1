import type { cors } from "hono/cors";

/** Options accepted by Hono's cors middleware */
export type CorsOptions = NonNullable<Parameters<typeof cors>[0]>;

export interface CorsConfig {
  /**
   * - `true` or `'default'`: apply CORS built from allowedOrigins
   * - `false`: no CORS middleware, no CORS headers
   */
  enabled?: boolean | "default";
  /** Overrides merged over the defaults */
  defaults?: Partial<CorsOptions>;
}
