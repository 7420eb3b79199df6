// ─── LendingAPIClient ──────────────────────────────────────────────────────
// Lightweight, zero-dependency SDK client for the lending API.
// Works in Node.js 20+ (uses native fetch).
// ────────────────────────────────────────────────────────────────────────────

import type {
  APIErrorEnvelope,
  BalanceChange,
  ConvertDirection,
  CreatePoolOpts,
  CreditRecord,
  HealthResponse,
  LiquidationAlert,
  LiquidationResult,
  Loan,
  LoanHealth,
  OpenLoanInput,
  Pool,
  RegisterUserResponse,
  RepayResult,
} from './types.js';

export class LendingAPIError extends Error {
  constructor(
    public readonly status: number,
    public readonly code: string,
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
    this.name = 'LendingAPIError';
  }
}

export interface LendingAPIClientOptions {
  /** Base URL of the API server (e.g. "http://localhost:8787"). */
  baseUrl: string;
  /** User API key, sent as a bearer token on authenticated endpoints. */
  apiKey?: string;
  /** Admin key for pool and price management. */
  adminKey?: string;
  /** Optional custom fetch implementation (defaults to globalThis.fetch). */
  fetch?: typeof globalThis.fetch;
}

const isErrorEnvelope = (body: unknown): body is APIErrorEnvelope => {
  if (typeof body !== 'object' || body === null || !('error' in body)) return false;
  const { error } = body;
  return typeof error === 'object' && error !== null
    && 'code' in error && typeof error.code === 'string'
    && 'message' in error && typeof error.message === 'string';
};

export class LendingAPIClient {
  private readonly baseUrl: string;
  private readonly apiKey?: string;
  private readonly adminKey?: string;
  private readonly _fetch: typeof globalThis.fetch;

  constructor(baseUrl: string, apiKey?: string);
  constructor(opts: LendingAPIClientOptions);
  constructor(baseUrlOrOpts: string | LendingAPIClientOptions, apiKey?: string) {
    if (typeof baseUrlOrOpts === 'string') {
      this.baseUrl = baseUrlOrOpts.replace(/\/+$/, '');
      this.apiKey = apiKey;
      this._fetch = globalThis.fetch;
    } else {
      this.baseUrl = baseUrlOrOpts.baseUrl.replace(/\/+$/, '');
      this.apiKey = baseUrlOrOpts.apiKey;
      this.adminKey = baseUrlOrOpts.adminKey;
      this._fetch = baseUrlOrOpts.fetch ?? globalThis.fetch;
    }
  }

  /** A client for the same server acting as another user. */
  withApiKey(apiKey: string): LendingAPIClient {
    return new LendingAPIClient({ baseUrl: this.baseUrl, apiKey, adminKey: this.adminKey, fetch: this._fetch });
  }

  // ─── Internal helpers ──────────────────────────────────────────────────

  private headers(): Record<string, string> {
    const h: Record<string, string> = { 'content-type': 'application/json' };
    if (this.apiKey) h['authorization'] = `Bearer ${this.apiKey}`;
    if (this.adminKey) h['x-admin-key'] = this.adminKey;
    return h;
  }

  private async request<T>(method: string, path: string, body?: unknown): Promise<T> {
    const url = `${this.baseUrl}${path}`;
    const res = await this._fetch(url, {
      method,
      headers: this.headers(),
      body: body !== undefined ? JSON.stringify(body) : undefined,
    });

    if (!res.ok) {
      const errorBody: unknown = await res.json().catch(() => undefined);
      const envelope = isErrorEnvelope(errorBody) ? errorBody.error : undefined;
      throw new LendingAPIError(
        res.status,
        envelope?.code ?? `HTTP_${res.status}`,
        envelope?.message ?? `Request failed: ${method} ${path} → ${res.status}`,
        envelope?.details,
      );
    }

    return (await res.json()) as T;
  }

  private get<T>(path: string): Promise<T> {
    return this.request<T>('GET', path);
  }

  private post<T>(path: string, body?: unknown): Promise<T> {
    return this.request<T>('POST', path, body ?? {});
  }

  // ─── Users ─────────────────────────────────────────────────────────────

  /** Register a new user. The returned API key is shown only once. */
  async registerUser(): Promise<RegisterUserResponse> {
    return this.post<RegisterUserResponse>('/users/register');
  }

  async getCreditRecord(userId: string): Promise<CreditRecord> {
    return this.get<CreditRecord>(`/users/${encodeURIComponent(userId)}`);
  }

  /** Supply balance including interest earned so far. */
  async getDepositBalance(userId: string, assetId: string): Promise<number> {
    const result = await this.get<{ balance: number }>(
      `/users/${encodeURIComponent(userId)}/deposits/${encodeURIComponent(assetId)}`,
    );
    return result.balance;
  }

  // ─── Pools & prices ────────────────────────────────────────────────────

  async listPools(): Promise<Pool[]> {
    const result = await this.get<{ pools: Pool[] }>('/pools');
    return result.pools;
  }

  async getPool(assetId: string): Promise<Pool> {
    return this.get<Pool>(`/pools/${encodeURIComponent(assetId)}`);
  }

  /** Admin only. */
  async createPool(opts: CreatePoolOpts): Promise<Pool> {
    return this.post<Pool>('/pools', opts);
  }

  async getPrices(): Promise<Record<string, number>> {
    const result = await this.get<{ prices: Record<string, number> }>('/prices');
    return result.prices;
  }

  /** Admin only. */
  async setPrice(assetId: string, price: number): Promise<void> {
    await this.post('/prices', { assetId, price });
  }

  // ─── Supply & collateral ───────────────────────────────────────────────

  async deposit(assetId: string, amount: number): Promise<BalanceChange> {
    return this.post<BalanceChange>('/supply/deposit', { assetId, amount });
  }

  async withdraw(assetId: string, amount: number): Promise<BalanceChange> {
    return this.post<BalanceChange>('/supply/withdraw', { assetId, amount });
  }

  async depositCollateral(assetId: string, amount: number): Promise<BalanceChange> {
    return this.post<BalanceChange>('/collateral/deposit', { assetId, amount });
  }

  async withdrawCollateral(assetId: string, amount: number): Promise<BalanceChange> {
    return this.post<BalanceChange>('/collateral/withdraw', { assetId, amount });
  }

  async convert(assetId: string, amount: number, direction: ConvertDirection): Promise<BalanceChange> {
    return this.post<BalanceChange>('/collateral/convert', { assetId, amount, direction });
  }

  // ─── Loans ─────────────────────────────────────────────────────────────

  /** Open a loan against free collateral already deposited. */
  async borrow(input: OpenLoanInput): Promise<Loan> {
    return this.post<Loan>('/loans', input);
  }

  async getLoan(loanId: string): Promise<Loan> {
    return this.get<Loan>(`/loans/${encodeURIComponent(loanId)}`);
  }

  async getLoanHealth(loanId: string): Promise<LoanHealth> {
    return this.get<LoanHealth>(`/loans/${encodeURIComponent(loanId)}/health`);
  }

  async findBadLoans(): Promise<string[]> {
    const result = await this.get<{ loanIds: string[] }>('/loans/bad');
    return result.loanIds;
  }

  async borrowMore(loanId: string, amount: number): Promise<Loan> {
    return this.post<Loan>(`/loans/${encodeURIComponent(loanId)}/borrow`, { amount });
  }

  async addCollateral(loanId: string, amount: number): Promise<Loan> {
    return this.post<Loan>(`/loans/${encodeURIComponent(loanId)}/collateral`, { amount });
  }

  async repay(loanId: string, amount: number): Promise<RepayResult> {
    return this.post<RepayResult>(`/loans/${encodeURIComponent(loanId)}/repay`, { amount });
  }

  async liquidate(loanId: string, repayAmount: number): Promise<LiquidationResult> {
    return this.post<LiquidationResult>(`/loans/${encodeURIComponent(loanId)}/liquidate`, { repayAmount });
  }

  async transferLoan(loanId: string, toUserId: string): Promise<Loan> {
    return this.post<Loan>(`/loans/${encodeURIComponent(loanId)}/transfer`, { toUserId });
  }

  // ─── Monitor ───────────────────────────────────────────────────────────

  async getAlerts(): Promise<LiquidationAlert[]> {
    const result = await this.get<{ alerts: LiquidationAlert[] }>('/monitor/alerts');
    return result.alerts;
  }

  // ─── System ────────────────────────────────────────────────────────────

  async health(): Promise<HealthResponse> {
    return this.get<HealthResponse>('/health');
  }
}
