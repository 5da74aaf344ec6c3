/**
 * Core domain types for the security event model.
 *
 * These types define the canonical shape of an event as it flows
 * through the pipeline. They carry no framework dependencies.
 */

/**
 * Canonical security event.
 *
 * Built once by the ingestion pipeline and frozen before it is stored,
 * so every reader sees the same values for the lifetime of the process.
 */
export interface SecurityEvent {
  readonly event_id: string;
  readonly timestamp: string; // ISO-8601, second resolution
  readonly source_address: string;
  readonly description: string;
  readonly country: string;
  readonly city: string;
  readonly latitude: number | null;
  readonly longitude: number | null;
  readonly is_threat: boolean;
}
