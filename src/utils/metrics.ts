export interface AdmissionMetrics {
  allowed: number;
  blocked: number;
  errors: number;
}

const metrics: AdmissionMetrics = {
  allowed: 0,
  blocked: 0,
  errors: 0,
};

export function recordAllowed() {
  metrics.allowed++;
}

export function recordBlocked() {
  metrics.blocked++;
}

export function recordError() {
  metrics.errors++;
}

export function getMetrics(): AdmissionMetrics {
  return { ...metrics };
}

export function resetMetrics() {
  metrics.allowed = 0;
  metrics.blocked = 0;
  metrics.errors = 0;
}
