import type { FastifyInstance, FastifyReply } from 'fastify';
import { z } from 'zod';
import type { AppConfig } from '../config.js';
import { DomainError, ErrorCode, toErrorEnvelope } from '../errors/taxonomy.js';
import type { LendingService } from '../services/lendingService.js';
import type { LiquidationMonitorService } from '../services/liquidationMonitorService.js';
import { requireAdmin, resolveUserFromKey } from './auth.js';

interface RouteDeps {
  config: AppConfig;
  lending: LendingService;
  monitor: LiquidationMonitorService;
  getRuntimeMetrics: () => { uptimeSeconds: number; processPid: number };
}

const assetIdSchema = z.string().min(1).max(32);
const amountSchema = z.number().positive().finite();

const createPoolSchema = z.object({
  assetId: assetIdSchema,
  reserveFactor: z.number().min(0).lt(1).optional(),
});

const setPriceSchema = z.object({
  assetId: assetIdSchema,
  price: z.number().positive().finite(),
});

const assetAmountSchema = z.object({
  assetId: assetIdSchema,
  amount: amountSchema,
});

const convertSchema = assetAmountSchema.extend({
  direction: z.enum(['to_collateral', 'to_deposit']),
});

const openLoanSchema = z.object({
  collateralAssetId: assetIdSchema,
  collateralAmount: amountSchema,
  debtAssetId: assetIdSchema,
  amount: amountSchema,
});

const amountOnlySchema = z.object({ amount: amountSchema });

const liquidateSchema = z.object({ repayAmount: amountSchema });

const transferSchema = z.object({ toUserId: z.string().min(1) });

type LoanParams = { Params: { loanId: string } };

const sendInvalidPayload = (reply: FastifyReply, error: z.ZodError): FastifyReply => reply.code(400).send(
  toErrorEnvelope(ErrorCode.InvalidPayload, 'Invalid request payload.', error.flatten()),
);

const sendDomainError = (reply: FastifyReply, error: unknown): void => {
  if (error instanceof DomainError) {
    void reply.code(error.statusCode).send(toErrorEnvelope(error.code, error.message, error.details));
    return;
  }

  void reply.code(500).send(toErrorEnvelope(
    ErrorCode.InternalError,
    'Unexpected internal error',
    { error: String(error) },
  ));
};

export async function registerRoutes(app: FastifyInstance, deps: RouteDeps): Promise<void> {
  const { lending, monitor } = deps;

  app.get('/', async () => ({
    name: deps.config.app.name,
    status: 'ok',
  }));

  app.get('/health', async () => ({
    status: 'ok',
    env: deps.config.app.env,
    pools: lending.listPools().length,
    monitorRunning: monitor.isRunning(),
    ...deps.getRuntimeMetrics(),
  }));

  /* ── pools & prices ────────────────────────────────────────── */

  app.get('/pools', async () => ({ pools: lending.listPools() }));

  app.get<{ Params: { assetId: string } }>('/pools/:assetId', async (request, reply) => {
    try {
      return lending.getPool(request.params.assetId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/pools', async (request, reply) => {
    if (!requireAdmin(request, reply, deps.config.app.adminKey)) return undefined;

    const parse = createPoolSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      const pool = await lending.createPool(parse.data.assetId, parse.data.reserveFactor);
      return reply.code(201).send(pool);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<{ Params: { assetId: string } }>('/pools/:assetId/accrue', async (request, reply) => {
    if (!requireAdmin(request, reply, deps.config.app.adminKey)) return undefined;

    try {
      return await lending.accruePool(request.params.assetId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/prices', async () => ({ prices: lending.getPrices() }));

  app.post('/prices', async (request, reply) => {
    if (!requireAdmin(request, reply, deps.config.app.adminKey)) return undefined;

    const parse = setPriceSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      await lending.setPrice(parse.data.assetId, parse.data.price);
      return { assetId: parse.data.assetId, price: parse.data.price };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  /* ── users ─────────────────────────────────────────────────── */

  app.post('/users/register', async (_request, reply) => {
    const registered = await lending.registerUser();
    return reply.code(201).send(registered);
  });

  app.get<{ Params: { userId: string } }>('/users/:userId', async (request, reply) => {
    try {
      return lending.getCreditRecord(request.params.userId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get<{ Params: { userId: string; assetId: string } }>('/users/:userId/deposits/:assetId', async (request, reply) => {
    try {
      const { userId, assetId } = request.params;
      return { userId, assetId, balance: lending.getDepositBalance(userId, assetId) };
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  /* ── supply & collateral ───────────────────────────────────── */

  app.post('/supply/deposit', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = assetAmountSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.deposit(userId, parse.data.assetId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/supply/withdraw', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = assetAmountSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.withdraw(userId, parse.data.assetId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/collateral/deposit', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = assetAmountSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.depositCollateral(userId, parse.data.assetId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/collateral/withdraw', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = assetAmountSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.withdrawCollateral(userId, parse.data.assetId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post('/collateral/convert', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = convertSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    const { assetId, amount, direction } = parse.data;
    try {
      return direction === 'to_collateral'
        ? await lending.convertDepositToCollateral(userId, assetId, amount)
        : await lending.convertCollateralToDeposit(userId, assetId, amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  /* ── loans ─────────────────────────────────────────────────── */

  app.post('/loans', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = openLoanSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      const loan = await lending.borrow(userId, parse.data);
      return reply.code(201).send(loan);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get('/loans/bad', async () => ({ loanIds: [...lending.findBadLoans()] }));

  app.get<LoanParams>('/loans/:loanId', async (request, reply) => {
    try {
      return lending.getLoan(request.params.loanId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.get<LoanParams>('/loans/:loanId/health', async (request, reply) => {
    try {
      return lending.assessLoan(request.params.loanId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<LoanParams>('/loans/:loanId/borrow', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = amountOnlySchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.borrowAdditional(userId, request.params.loanId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<LoanParams>('/loans/:loanId/collateral', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = amountOnlySchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.addCollateral(userId, request.params.loanId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<LoanParams>('/loans/:loanId/repay', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = amountOnlySchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.repay(userId, request.params.loanId, parse.data.amount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<LoanParams>('/loans/:loanId/liquidate', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = liquidateSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.liquidate(userId, request.params.loanId, parse.data.repayAmount);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  app.post<LoanParams>('/loans/:loanId/transfer', async (request, reply) => {
    const userId = resolveUserFromKey(request, reply, lending);
    if (!userId) return undefined;

    const parse = transferSchema.safeParse(request.body);
    if (!parse.success) return sendInvalidPayload(reply, parse.error);

    try {
      return await lending.transferLoan(userId, request.params.loanId, parse.data.toUserId);
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });

  /* ── monitor ───────────────────────────────────────────────── */

  app.get('/monitor/alerts', async () => ({
    alerts: monitor.getAlerts(),
    lastScanAt: monitor.getLastScanAt(),
  }));

  app.post('/monitor/scan', async (request, reply) => {
    if (!requireAdmin(request, reply, deps.config.app.adminKey)) return undefined;

    try {
      return await monitor.scan();
    } catch (error) {
      sendDomainError(reply, error);
      return undefined;
    }
  });
}
