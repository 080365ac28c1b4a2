import type { HostSample } from '../domain/metrics/metrics-record.js';

export interface HostProbe {
  sample(): Promise<HostSample>;
}
