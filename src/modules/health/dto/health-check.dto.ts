export type ProbeStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface HealthProbeResult {
  status: ProbeStatus;
  responseTimeMs: number;
  error?: string;
  lastChecked: string; // ISO timestamp
}

export interface HealthLivenessDto {
  status: 'ok';
  timestamp: string;
  uptime: number;
}

export interface HealthReadinessDto {
  status: 'ready' | 'not_ready';
  timestamp: string;
  checks: Record<string, HealthProbeResult>;
}
