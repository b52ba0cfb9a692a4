/**
 * Type definitions for the Detection Orchestrator
 */

export enum Capability {
  DAMAGE = 'damage',
  MATERIAL = 'material',
  VOLUME = 'volume'
}

export const CAPABILITIES: readonly Capability[] = Object.values(Capability);

export enum RequestPriority {
  HIGH = 'high',
  NORMAL = 'normal',
  LOW = 'low'
}

export enum DetectionStatus {
  QUEUED = 'QUEUED',
  PROCESSING = 'PROCESSING',
  COMPLETED = 'COMPLETED',
  FAILED = 'FAILED',
  PARTIAL = 'PARTIAL'
}

export enum CircuitState {
  CLOSED = 'CLOSED',
  OPEN = 'OPEN',
  HALF_OPEN = 'HALF_OPEN'
}

export enum BalancingStrategy {
  ROUND_ROBIN = 'round_robin',
  WEIGHTED = 'weighted',
  LEAST_LATENCY = 'least_latency'
}

export interface ModelVersion {
  readonly name: string;
  readonly version: string;
  readonly capability: Capability;
  readonly endpoint: string;
  readonly confidenceThreshold: number; // 0-1
  readonly enabled: boolean;
}

export interface ABTestConfig {
  experimentId: string;
  modelA: ModelVersion;
  modelB: ModelVersion;
  trafficSplit: number; // fraction of traffic routed to modelA
  enabled: boolean;
}

export interface EngineHealth {
  capability: Capability;
  endpoint: string;
  healthy: boolean;
  lastCheckTime: Date | null;
  lastResponseTimeMs: number | null;
  errorCount: number;
  consecutiveFailures: number;
}

export interface CircuitBreakerSnapshot {
  endpoint: string;
  state: CircuitState;
  failureCount: number;
  openedAt: Date | null;
  successCountInHalfOpen: number;
  probeInFlight: boolean;
}

export interface DetectionRequest {
  photoId: string;
  photoUrl: string;
  capabilities: Capability[];
  priority: RequestPriority;
  metadata: Record<string, unknown>;
}

export interface EngineResult {
  capability: Capability;
  modelVersion: string;
  endpoint: string | null;
  confidence: number;
  meetsThreshold: boolean;
  resultPayload: Record<string, unknown>;
  processingTimeMs: number;
  error?: string;
  errorCode?: string;
}

export type CapabilityMap<T> = Partial<Record<Capability, T>>;

export interface DetectionResponse {
  requestId: string;
  detectionId: string;
  photoId: string;
  status: DetectionStatus;
  results: CapabilityMap<EngineResult>;
  totalProcessingTimeMs: number;
  modelVersions: CapabilityMap<string>;
  correlationId: string;
  timestamp: Date;
  error?: string;
}

export interface SubmitOptions {
  correlationId?: string;
  deadlineMs?: number;
}

export type CallOutcome = 'success' | 'failure' | 'timeout' | 'rejected';

export interface EngineMetrics {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  timeouts: number;
  rejections: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p90LatencyMs: number;
  p95LatencyMs: number;
  errorRate: number;
  avgConfidence: number;
}

export interface OrchestratorMetrics {
  totalRequests: number;
  successfulRequests: number;
  partialRequests: number;
  failedRequests: number;
  avgLatencyMs: number;
  p50LatencyMs: number;
  p90LatencyMs: number;
  p95LatencyMs: number;
  errorRate: number;
  engineMetrics: CapabilityMap<EngineMetrics>;
}

export interface Selection {
  capability: Capability;
  model: ModelVersion;
  endpoint: string;
  reason: 'ab_test' | BalancingStrategy;
  experimentId?: string;
}

export interface HealthSummary {
  status: 'healthy' | 'degraded' | 'unhealthy';
  totalEngines: number;
  healthyEngines: number;
}
