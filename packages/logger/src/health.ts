import { logger } from './index.js';

export type HealthStatus = 'healthy' | 'degraded' | 'unhealthy';

export interface CheckResult {
  status: HealthStatus;
  message?: string;
  /** Milliseconds; filled in by the checker when the check leaves it out. */
  responseTime?: number;
  details?: Record<string, unknown>;
}

export type HealthCheck = () => Promise<CheckResult>;

export interface HealthReport {
  service: string;
  status: HealthStatus;
  uptime: number;
  timestamp: string;
  version: string;
  checks: Record<string, CheckResult>;
  overall: CheckResult;
}

const SEVERITY: Record<HealthStatus, number> = { healthy: 0, degraded: 1, unhealthy: 2 };

const SUMMARY: Record<HealthStatus, string> = {
  healthy: 'All checks passed',
  degraded: 'Some checks are degraded',
  unhealthy: 'One or more critical checks failed',
};

/**
 * Named dependency checks run together on demand. The worst status wins; a
 * check that throws or outlives its timeout counts as unhealthy.
 */
export class HealthChecker {
  private readonly checks = new Map<string, HealthCheck>();
  private readonly startedAt = Date.now() - 1;

  constructor(
    private readonly service: string,
    private readonly version = '0.0.0',
    private readonly timeoutMs = 5_000,
  ) {}

  register(name: string, check: HealthCheck): void {
    this.checks.set(name, check);
  }

  async check(): Promise<HealthReport> {
    const started = Date.now();
    const entries = await Promise.all(
      Array.from(this.checks, async ([name, check]) => [name, await this.run(check)] as const),
    );
    const checks = Object.fromEntries(entries);

    const status = entries.reduce<HealthStatus>(
      (worst, [, result]) => (SEVERITY[result.status] > SEVERITY[worst] ? result.status : worst),
      'healthy',
    );

    const report: HealthReport = {
      service: this.service,
      status,
      uptime: Date.now() - this.startedAt,
      timestamp: new Date().toISOString(),
      version: this.version,
      checks,
      overall: { status, message: SUMMARY[status], responseTime: Date.now() - started },
    };

    if (status === 'unhealthy') logger.error({ health: report }, 'Health check failed');
    else if (status === 'degraded') logger.warn({ health: report }, 'Health check degraded');

    return report;
  }

  private async run(check: HealthCheck): Promise<CheckResult> {
    const started = Date.now();
    let timer: NodeJS.Timeout | undefined;
    const timedOut = new Promise<CheckResult>((resolve) => {
      timer = setTimeout(() => resolve({ status: 'unhealthy', message: 'Health check timeout' }), this.timeoutMs);
    });
    try {
      const result = await Promise.race([check(), timedOut]);
      return { ...result, responseTime: result.responseTime ?? Date.now() - started };
    } catch (error) {
      return {
        status: 'unhealthy',
        message: error instanceof Error ? error.message : String(error),
        responseTime: Date.now() - started,
      };
    } finally {
      clearTimeout(timer);
    }
  }
}

/** What the Discord check reads from a discord.js Client. */
export interface DiscordClientView {
  isReady(): boolean;
  guilds: { cache: { size: number } };
  ws: { ping: number };
}

export async function checkDiscord(client: DiscordClientView): Promise<CheckResult> {
  if (!client.isReady()) {
    return { status: 'unhealthy', message: 'Discord client not ready' };
  }
  return {
    status: 'healthy',
    details: { guilds: client.guilds.cache.size, ping: client.ws.ping },
  };
}

export async function checkRedis(client: { ping(): Promise<string> }): Promise<CheckResult> {
  try {
    const reply = await client.ping();
    return reply === 'PONG'
      ? { status: 'healthy' }
      : { status: 'unhealthy', message: `Unexpected Redis reply: ${reply}` };
  } catch (error) {
    return {
      status: 'unhealthy',
      message: `Redis unreachable: ${error instanceof Error ? error.message : String(error)}`,
    };
  }
}

/**
 * Heap usage against a budget: degraded past 75%, unhealthy past 90%.
 */
export async function checkHeap(budgetMb = 1024): Promise<CheckResult> {
  const heapMb = process.memoryUsage().heapUsed / 1024 / 1024;
  const ratio = heapMb / budgetMb;
  const status: HealthStatus = ratio > 0.9 ? 'unhealthy' : ratio > 0.75 ? 'degraded' : 'healthy';
  return { status, details: { heapMb: Math.round(heapMb), budgetMb } };
}
