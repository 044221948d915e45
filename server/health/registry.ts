import type { Check } from "./checks";

export type CheckCategory = "liveness" | "readiness";

export interface CheckStatus {
  ok: boolean;
  detail?: string;
}

export interface EvaluationResult {
  ok: boolean;
  checks: Record<string, CheckStatus>;
}

export function describeFailure(reason: unknown): string {
  if (reason instanceof Error) {
    if (reason.message) return reason.message;
    const code = "code" in reason && typeof reason.code === "string" ? reason.code : undefined;
    return code || reason.name;
  }
  return String(reason);
}

async function run(check: Check): Promise<void> {
  await check();
}

/**
 * Named liveness and readiness checks. Every evaluation runs the requested
 * checks afresh and concurrently, so its latency is that of the slowest one.
 */
export class HealthRegistry {
  private readonly categories: Record<CheckCategory, Map<string, Check>> = {
    liveness: new Map(),
    readiness: new Map()
  };

  addLivenessCheck(name: string, check: Check): void {
    this.add("liveness", name, check);
  }

  addReadinessCheck(name: string, check: Check): void {
    this.add("readiness", name, check);
  }

  names(category: CheckCategory): string[] {
    return [...this.categories[category].keys()];
  }

  async evaluate(...categories: CheckCategory[]): Promise<EvaluationResult> {
    const entries = categories.flatMap(c => [...this.categories[c].entries()]);
    const settled = await Promise.allSettled(entries.map(([, check]) => run(check)));

    const checks: Record<string, CheckStatus> = {};
    settled.forEach((outcome, i) => {
      const [name] = entries[i];
      checks[name] = outcome.status === "fulfilled"
        ? { ok: true }
        : { ok: false, detail: describeFailure(outcome.reason) };
    });

    return { ok: Object.values(checks).every(c => c.ok), checks };
  }

  live(): Promise<EvaluationResult> {
    return this.evaluate("liveness");
  }

  /** A process that is not live is not ready either. */
  ready(): Promise<EvaluationResult> {
    return this.evaluate("liveness", "readiness");
  }

  private add(category: CheckCategory, name: string, check: Check): void {
    if (this.categories.liveness.has(name) || this.categories.readiness.has(name)) {
      throw new Error(`health check "${name}" is already registered`);
    }
    this.categories[category].set(name, check);
  }
}
