/**
 * @relaykit/core — Pipeline Types
 *
 * Shared by the report and notification pipelines. Every value that crosses a
 * stage boundary is readonly: stages derive new values instead of mutating.
 */

// ─── Aliases ───────────────────────────────────────────────────────

/**
 * Registry key (report kind, output format, delivery method or channel)
 */
export type Tag = string;

/**
 * ISO 8601 timestamp string
 */
export type Timestamp = string;

export type PipelineName = 'report' | 'notification';

export type RegistryCategory = 'generator' | 'formatter' | 'delivery';

// ─── Request ───────────────────────────────────────────────────────

/**
 * One generator → formatter → delivery pairing of a request.
 */
export interface Route {
  readonly generator: Tag;
  readonly formatter: Tag;
  readonly delivery: Tag;
  /** Address, phone number or device id; strategies may fall back to a configured default */
  readonly recipient?: string;
}

export interface DispatchRequest {
  readonly id: string;
  readonly pipeline: PipelineName;
  /** Raw input, validated by each generator */
  readonly payload: unknown;
  readonly routes: readonly Route[];
  /** Business key the request is about (order id for notifications) */
  readonly reference?: string;
}

// ─── Stage Outputs ─────────────────────────────────────────────────

export interface Content {
  readonly kind: Tag;
  readonly body: string;
  readonly metadata: Readonly<Record<string, unknown>>;
  readonly generatedAt: Timestamp;
}

export interface FinalArtifact {
  readonly kind: Tag;
  readonly format: Tag;
  readonly rendered: string;
  readonly metadata: Readonly<Record<string, unknown>>;
}

export type DeliveryErrorCode =
  | 'INVALID_RECIPIENT'
  | 'DELIVERY_TIMEOUT'
  | 'DELIVERY_CANCELLED'
  | 'DELIVERY_FAILED';

export interface DeliveryResult {
  success: boolean;
  method: Tag;
  recipient?: string;
  /** What the simulated transport was handed */
  receipt?: Record<string, unknown>;
  error?: string;
  errorCode?: DeliveryErrorCode;
}

// ─── Strategies ────────────────────────────────────────────────────

export interface GenerationContext {
  now: Date;
}

export interface ContentGenerator {
  readonly kind: Tag;
  /** Throws InvalidPayloadError when the payload does not match the generator's schema */
  generate(payload: unknown, ctx: GenerationContext): Content;
}

export interface Formatter {
  readonly format: Tag;
  apply(content: Content): FinalArtifact;
}

export interface DeliveryContext {
  signal: AbortSignal;
  now: Date;
  requestId: string;
}

export interface DeliveryStrategy {
  readonly method: Tag;
  deliver(artifact: FinalArtifact, recipient: string | undefined, ctx: DeliveryContext): Promise<DeliveryResult>;
}

// ─── History ───────────────────────────────────────────────────────

export type DeliveryOutcome = 'success' | 'failed';

export interface HistoryEntry {
  readonly id: string;
  readonly requestId: string;
  readonly pipeline: PipelineName;
  readonly kind: Tag;
  readonly format: Tag;
  readonly deliveryMethod: Tag;
  readonly recipient?: string;
  readonly reference?: string;
  readonly timestamp: Timestamp;
  readonly outcome: DeliveryOutcome;
  readonly error?: string;
  /** Leading slice of the rendered artifact */
  readonly summary: string;
  /** Aggregates the generator computed (totals, counts, balance) */
  readonly metadata: Readonly<Record<string, unknown>>;
}

// ─── Orchestration ─────────────────────────────────────────────────

export type RequestState =
  | 'received'
  | 'content_built'
  | 'formatted'
  | 'delivering'
  | 'delivered'
  | 'partially_failed'
  | 'failed'
  | 'rejected'
  | 'cancelled'
  | 'logged';

export type DispatchStatus = 'delivered' | 'partially_failed' | 'failed' | 'cancelled';

export interface DispatchOutcome {
  requestId: string;
  status: DispatchStatus;
  contents: Content[];
  artifacts: FinalArtifact[];
  results: DeliveryResult[];
  entries: HistoryEntry[];
  trail: RequestState[];
}

// ─── Domain Payloads ───────────────────────────────────────────────

export interface SaleItem {
  product: string;
  amount: number;
}

export interface InventoryItem {
  name: string;
  category: string;
  quantity: number;
}

export interface Customer {
  name: string;
  email: string;
  phone: string;
  deviceId: string;
}
