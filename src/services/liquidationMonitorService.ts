import { v4 as uuid } from 'uuid';
import type { AppConfig } from '../config.js';
import type { LiquidationAlert } from '../domain/lending/lendingTypes.js';
import type { RiskAssessment } from '../domain/lending/riskEngine.js';
import type { EventBus } from '../infra/eventBus.js';
import type { EventLogger } from '../infra/logger.js';
import { isoNow } from '../utils/time.js';
import type { LendingService } from './lendingService.js';

const suggestedActionFor = (assessment: RiskAssessment): string => {
  const hf = assessment.healthFactor.toFixed(2);
  switch (assessment.liquidationBlock) {
    case null:
      return assessment.closeFactor >= 1
        ? `Liquidate up to ${assessment.maxLiquidatable} of the debt. Health factor ${hf} allows a full close.`
        : `Liquidate up to ${assessment.maxLiquidatable} of the debt. Health factor ${hf} allows a partial close.`;
    case 'not_improving':
      return `Health factor ${hf} is unhealthy, but no partial liquidation can raise it. `
        + 'The borrower must add collateral or repay.';
    case 'no_collateral':
      return `Health factor ${hf} with no collateral left to seize. The remaining debt is uncovered.`;
    case 'healthy':
    case 'closed':
    default:
      return 'No action needed.';
  }
};

export interface ScanResult {
  scannedAt: string;
  alerts: LiquidationAlert[];
}

/**
 * Periodic sweep over `findBadLoans()`. Runs outside the core: it only reads
 * and reports, and never liquidates on its own.
 */
export class LiquidationMonitorService {
  private scanTimer: ReturnType<typeof setInterval> | null = null;
  /** Latest alert per loan id; a loan that drops out of a scan loses its alert. */
  private readonly alerts = new Map<string, LiquidationAlert>();
  private lastScanAt: string | null = null;

  constructor(
    private readonly lending: LendingService,
    private readonly bus: EventBus,
    private readonly logger: EventLogger,
    private readonly config: AppConfig,
  ) {}

  /* ── lifecycle ─────────────────────────────────────────────── */

  start(): void {
    if (!this.config.monitor.enabled) return;
    if (this.scanTimer) return;

    this.scanTimer = setInterval(() => {
      this.scan().catch((error: unknown) => {
        this.logger.log('error', 'monitor.scan.failed', {
          error: error instanceof Error ? error.message : String(error),
        }).catch(() => undefined);
      });
    }, this.config.monitor.scanIntervalMs);
  }

  stop(): void {
    if (this.scanTimer) {
      clearInterval(this.scanTimer);
      this.scanTimer = null;
    }
  }

  isRunning(): boolean {
    return this.scanTimer !== null;
  }

  /* ── read helpers ──────────────────────────────────────────── */

  getAlerts(): LiquidationAlert[] {
    return [...this.alerts.values()];
  }

  getLastScanAt(): string | null {
    return this.lastScanAt;
  }

  /* ── scan ──────────────────────────────────────────────────── */

  async scan(): Promise<ScanResult> {
    const now = isoNow();
    const newAlerts: LiquidationAlert[] = [];
    const flagged = new Set<string>();

    for (const loanId of this.lending.findBadLoans()) {
      const assessment = this.lending.assessLoan(loanId);
      if (assessment.severity === 'SAFE') continue;

      const loan = this.lending.getLoan(loanId);
      const alert: LiquidationAlert = {
        id: uuid(),
        loanId,
        borrowerId: loan.borrowerId,
        severity: assessment.severity,
        healthFactor: assessment.healthFactor,
        suggestedAction: suggestedActionFor(assessment),
        createdAt: now,
      };

      flagged.add(loanId);
      this.alerts.set(loanId, alert);
      newAlerts.push(alert);
      this.bus.emit('monitor.alert', alert);
    }

    for (const loanId of this.alerts.keys()) {
      if (!flagged.has(loanId)) this.alerts.delete(loanId);
    }

    this.lastScanAt = now;
    await this.logger.log('info', 'monitor.scan', { alerts: newAlerts.length });

    return { scannedAt: now, alerts: newAlerts };
  }
}
