/**
 * SLA Resolver
 *
 * Exact (companyKey, severity) lookup over the threshold matrix. A miss is a
 * normal outcome: the ticket's resolution compliance becomes indeterminate.
 */

import { SLAThreshold, Severity } from './types';

export class ThresholdIndex {
  private readonly byKey = new Map<string, SLAThreshold>();

  constructor(thresholds: readonly SLAThreshold[]) {
    for (const t of thresholds) {
      this.byKey.set(ThresholdIndex.key(t.companyKey, t.severity), t);
    }
  }

  resolve(companyKey: string, severity: Severity): SLAThreshold | null {
    return this.byKey.get(ThresholdIndex.key(companyKey, severity)) ?? null;
  }

  get size(): number {
    return this.byKey.size;
  }

  private static key(companyKey: string, severity: Severity): string {
    return `${companyKey}\u0000${severity}`;
  }
}
