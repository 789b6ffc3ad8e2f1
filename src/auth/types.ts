/**
 * Shared-secret gate configuration.
 * One global secret gates every request it is mounted in front of.
 */
export interface ApiKeyConfig {
  /** Expected key. When unset, every request is rejected. */
  secret?: string;
  /** Request header carrying the key (default: "GLEN_LAB4_api_key") */
  headerName?: string;
}
