import { describe, expect, it } from "vitest";
import type { RestConfig } from "@/rest/types";
import { buildDefaultCorsOptions } from "../cors";

const restConfig: RestConfig = {
  allowedOrigins: [],
  apiKey: { secret: "test-secret" },
};

describe("buildDefaultCorsOptions", () => {
  it("should allow the API key header and every task verb", () => {
    const options = buildDefaultCorsOptions(restConfig);
    expect(options.allowHeaders).toEqual(["Content-Type", "GLEN_LAB4_api_key"]);
    expect(options.allowMethods).toEqual([
      "GET",
      "POST",
      "PATCH",
      "DELETE",
      "OPTIONS",
    ]);
  });

  it("should follow a custom API key header", () => {
    const options = buildDefaultCorsOptions({
      ...restConfig,
      apiKey: { secret: "test-secret", headerName: "x-api-key" },
    });
    expect(options.allowHeaders).toEqual(["Content-Type", "x-api-key"]);
  });

  it("should let configured defaults override", () => {
    const options = buildDefaultCorsOptions({
      ...restConfig,
      cors: { defaults: { maxAge: 60, credentials: true } },
    });
    expect(options.maxAge).toBe(60);
    expect(options.credentials).toBe(true);
  });
});
