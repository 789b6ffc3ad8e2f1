import type { Service } from "./types";

/** Typed identity for defining a service. */
export function createService(config: Service): Service {
  return config;
}
