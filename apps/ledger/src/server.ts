/**
 * Ledger server: donation settlement over HTTP.
 *
 * Owns: the ledger tables, the event log, the batch scheduler.
 *
 * Routes (mutations take a signed envelope { signer, sig, payload }):
 *   POST /donate            split + record a donation, deposit net into the vault
 *   POST /withdrawal        queue recipient shares into the open batch
 *   POST /batch/cooldown    (admin) start the current batch's cooldown
 *   POST /batch/unstake     (admin) release matured funds, advance the epoch
 *   POST /commitment-root   (admin) publish the claim commitment root
 *   POST /claim             proof-gated payout, once per epoch per participant
 *   GET  /yield/:epoch/:participant  signed yield for a share entry
 *   GET  /batch/:epoch      batch queued amount, cooldown start, state
 *   GET  /donor/:id         donor record
 *   GET  /recipient/:id     recipient record
 *   GET  /entry/:epoch/:id  per-epoch share entry
 *   GET  /stats             global counters
 *   GET  /events            event log (by type, from seq)
 *   GET  /health            health check
 */

import { fileURLToPath } from "node:url";
import { resolve } from "node:path";
import Fastify, { type FastifyError, type FastifyServerOptions } from "fastify";
import {
  AdminPayload,
  ClaimPayload,
  CommitmentRootPayload,
  DonatePayload,
  SignedRequest,
  WithdrawalPayload,
  decodeSignature,
  isHex32,
  toHex,
  verifyRequestSignature,
  type SignedRequestV1,
} from "@givepool/protocol";
import {
  MockToken,
  MockVault,
  VaultError,
  type TokenMover,
  type VaultAdapter,
} from "@givepool/vault-client";
import { config } from "./config.js";
import { EventQuery } from "./event-log/schemas.js";
import { EventLog } from "./event-log/writer.js";
import { createLedger, LedgerError, type LedgerSettings } from "./ledger/index.js";
import { ReplayGuard } from "./replay-guard.js";
import { createBatchScheduler } from "./scheduler.js";
import {
  batchToWire,
  detailToWire,
  donationToWire,
  donorToWire,
  recipientToWire,
  shareEntryToWire,
  statsToWire,
} from "./wire.js";

const STATUS_BY_CATEGORY = {
  validation: 422,
  lifecycle: 409,
  authorization: 403,
} as const;

export interface LedgerAppDeps {
  vault?: VaultAdapter;
  tokens?: TokenMover;
  settings?: Partial<LedgerSettings>;
  now?: () => number;
  logger?: FastifyServerOptions["logger"];
  requestMaxAgeMs?: number;
  /** Batch scheduler interval (ms). 0 = disabled. */
  schedulerIntervalMs?: number;
}

interface RequestDenial {
  error: string;
  detail: string;
}

function parseEpoch(raw: string): number | null {
  if (!/^[0-9]{1,15}$/.test(raw)) return null;
  return parseInt(raw, 10);
}

export async function buildApp(deps?: LedgerAppDeps) {
  const app = Fastify({ logger: deps?.logger ?? { level: config.logLevel } });
  const now = deps?.now ?? Date.now;
  const requestMaxAgeMs = deps?.requestMaxAgeMs ?? config.requestMaxAgeMs;

  let vault = deps?.vault;
  let tokens = deps?.tokens;
  if (!vault || !tokens) {
    const token = new MockToken(config.custodyAddress);
    tokens = token;
    vault = new MockVault(token, {
      address: config.vaultAddress,
      cooldownDurationMs: config.cooldownDurationMs,
      now,
    });
    app.log.warn("no vault adapter configured, dev mode (in-memory vault + token)");
  }

  const settings: LedgerSettings = {
    administrator: deps?.settings?.administrator ?? config.adminPubkey,
    operatingAddress: deps?.settings?.operatingAddress ?? config.operatingAddress,
    minimumBatchThreshold: deps?.settings?.minimumBatchThreshold ?? config.minBatchShares,
  };
  if (settings.administrator === "") {
    app.log.warn("ADMIN_PUBKEY not set; batch and root operations disabled");
  }

  const events = new EventLog();
  const ledger = createLedger({ vault, tokens, events, settings, now });

  const replayGuard = new ReplayGuard(2 * requestMaxAgeMs);
  const replayCleanup = setInterval(() => replayGuard.cleanup(now()), 60_000);

  const schedulerIntervalMs = deps?.schedulerIntervalMs ?? config.batchSchedulerIntervalMs;
  const scheduler =
    schedulerIntervalMs > 0 && settings.administrator !== ""
      ? createBatchScheduler(ledger, vault, {
          operator: settings.administrator,
          checkIntervalMs: schedulerIntervalMs,
          now,
          onAdvance: (t) => {
            app.log.info(
              { kind: t.kind, epoch: t.receipt.epoch },
              "batch advanced by scheduler",
            );
          },
          onError: (err) => {
            app.log.error({ err }, "scheduler error");
          },
        })
      : null;

  app.addHook("onReady", async () => {
    if (scheduler) {
      scheduler.start();
      app.log.info({ intervalMs: schedulerIntervalMs }, "batch scheduler started");
    }
  });

  app.addHook("onClose", async () => {
    clearInterval(replayCleanup);
    scheduler?.stop();
  });

  app.setErrorHandler<FastifyError>((err, req, reply) => {
    if (err instanceof LedgerError) {
      return reply.status(STATUS_BY_CATEGORY[err.category]).send({
        error: err.code,
        message: err.message,
        detail: detailToWire(err.detail),
      });
    }
    if (err.validation) {
      return reply.status(400).send({ error: "invalid_request", detail: err.message });
    }
    if (err instanceof VaultError) {
      req.log.warn({ err }, "vault refused operation");
      return reply.status(502).send({ error: "vault_error", detail: err.message });
    }
    req.log.error({ err }, "unhandled error");
    return reply.status(500).send({ error: "internal_error" });
  });

  /** Signature, freshness and replay checks. Null = accepted. */
  async function checkSignedRequest<P extends { timestamp: number }>(
    body: SignedRequestV1<P>,
  ): Promise<RequestDenial | null> {
    const sigValid = await verifyRequestSignature(body.signer, body.sig, body.payload);
    if (!sigValid) {
      return { error: "invalid_signature", detail: "Ed25519 sig verification failed" };
    }
    if (Math.abs(now() - body.payload.timestamp) > requestMaxAgeMs) {
      return { error: "stale_request", detail: `timestamp outside ±${requestMaxAgeMs}ms` };
    }
    // Keyed on the signature bytes; verification already refused every
    // spelling other than the canonical one.
    const sigBytes = decodeSignature(body.sig);
    if (!sigBytes || !replayGuard.accept(toHex(sigBytes), now())) {
      return { error: "replayed_request", detail: "signature already used" };
    }
    return null;
  }

  // ── Donate ─────────────────────────────────────────────────────
  app.post<{ Body: SignedRequestV1<DonatePayload> }>(
    "/donate",
    { schema: { body: SignedRequest(DonatePayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      const { signer, payload } = req.body;
      const receipt = await ledger.donate(signer, payload.recipient, BigInt(payload.amount));

      req.log.info(
        { donor: signer, recipient: payload.recipient, gross: payload.amount, epoch: receipt.epoch },
        "donation recorded",
      );
      return reply.send({ ok: true, ...donationToWire(receipt) });
    },
  );

  // ── Withdrawal request ─────────────────────────────────────────
  app.post<{ Body: SignedRequestV1<WithdrawalPayload> }>(
    "/withdrawal",
    { schema: { body: SignedRequest(WithdrawalPayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      const { signer, payload } = req.body;
      const receipt = await ledger.queueWithdrawal(signer, BigInt(payload.shares));

      req.log.info(
        { recipient: signer, shares: payload.shares, epoch: receipt.epoch },
        "withdrawal queued",
      );
      return reply.send({
        ok: true,
        epoch: receipt.epoch,
        shares: receipt.shares.toString(),
        remaining_shares: receipt.remainingShares.toString(),
      });
    },
  );

  // ── Batch lifecycle (admin) ────────────────────────────────────
  app.post<{ Body: SignedRequestV1<AdminPayload> }>(
    "/batch/cooldown",
    { schema: { body: SignedRequest(AdminPayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      const receipt = await ledger.startCooldown(req.body.signer);

      req.log.info(
        { epoch: receipt.epoch, shares: receipt.shares.toString() },
        "batch cooldown started",
      );
      return reply.send({
        ok: true,
        epoch: receipt.epoch,
        shares: receipt.shares.toString(),
        assets: receipt.assets.toString(),
      });
    },
  );

  app.post<{ Body: SignedRequestV1<AdminPayload> }>(
    "/batch/unstake",
    { schema: { body: SignedRequest(AdminPayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      const receipt = await ledger.completeUnstake(req.body.signer);

      req.log.info(
        { epoch: receipt.epoch, next: receipt.nextEpoch, released: receipt.releasedAssets.toString() },
        "batch unstaked",
      );
      return reply.send({
        ok: true,
        epoch: receipt.epoch,
        next_epoch: receipt.nextEpoch,
        released_assets: receipt.releasedAssets.toString(),
      });
    },
  );

  // ── Commitment root (admin) ────────────────────────────────────
  app.post<{ Body: SignedRequestV1<CommitmentRootPayload> }>(
    "/commitment-root",
    { schema: { body: SignedRequest(CommitmentRootPayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      await ledger.setCommitmentRoot(req.body.signer, req.body.payload.root);

      req.log.info({ root: req.body.payload.root }, "commitment root set");
      return reply.send({ ok: true, root: req.body.payload.root });
    },
  );

  // ── Claim ──────────────────────────────────────────────────────
  app.post<{ Body: SignedRequestV1<ClaimPayload> }>(
    "/claim",
    { schema: { body: SignedRequest(ClaimPayload) } },
    async (req, reply) => {
      const denied = await checkSignedRequest(req.body);
      if (denied) return reply.status(401).send(denied);

      const { signer, payload } = req.body;
      const receipt = await ledger.claim(signer, BigInt(payload.amount), payload.proof);

      req.log.info({ participant: signer, amount: payload.amount, epoch: receipt.epoch }, "claim paid");
      return reply.send({ ok: true, epoch: receipt.epoch, amount: receipt.amount.toString() });
    },
  );

  // ── Queries ────────────────────────────────────────────────────
  app.get<{ Params: { epoch: string; participant: string } }>(
    "/yield/:epoch/:participant",
    async (req, reply) => {
      const epoch = parseEpoch(req.params.epoch);
      if (epoch === null) return reply.status(400).send({ error: "invalid_epoch" });
      if (!isHex32(req.params.participant)) {
        return reply.status(400).send({ error: "invalid_participant" });
      }
      const amount = await ledger.getYield(epoch, req.params.participant);
      return reply.send({ epoch, participant: req.params.participant, yield: amount.toString() });
    },
  );

  app.get<{ Params: { epoch: string } }>("/batch/:epoch", async (req, reply) => {
    const epoch = parseEpoch(req.params.epoch);
    if (epoch === null) return reply.status(400).send({ error: "invalid_epoch" });
    return reply.send(batchToWire(epoch, ledger.getBatch(epoch)));
  });

  app.get<{ Params: { id: string } }>("/donor/:id", async (req, reply) => {
    const record = ledger.getDonor(req.params.id);
    if (!record) return reply.status(404).send({ error: "not_found" });
    return reply.send(donorToWire(req.params.id, record));
  });

  app.get<{ Params: { id: string } }>("/recipient/:id", async (req, reply) => {
    const record = ledger.getRecipient(req.params.id);
    if (!record) return reply.status(404).send({ error: "not_found" });
    return reply.send(recipientToWire(req.params.id, record));
  });

  app.get<{ Params: { epoch: string; id: string } }>("/entry/:epoch/:id", async (req, reply) => {
    const epoch = parseEpoch(req.params.epoch);
    if (epoch === null) return reply.status(400).send({ error: "invalid_epoch" });
    const entry = ledger.getShareEntry(epoch, req.params.id);
    if (!entry) return reply.status(404).send({ error: "not_found" });
    return reply.send(shareEntryToWire(epoch, req.params.id, entry));
  });

  app.get("/stats", async (_req, reply) => {
    return reply.send(statsToWire(ledger.stats()));
  });

  app.get<{ Querystring: EventQuery }>(
    "/events",
    { schema: { querystring: EventQuery } },
    async (req, reply) => {
      const from = req.query.from ?? 0;
      const list = req.query.type
        ? events.getEventsByType(req.query.type, from)
        : events.getEvents(from);
      return reply.send({ events: list, count: list.length });
    },
  );

  app.get("/health", async (_req, reply) => {
    return reply.send({
      status: "ok",
      epoch: ledger.currentEpoch(),
      events: events.getEventCount(),
      timestamp: now(),
    });
  });

  return app;
}

// Run if executed directly (not when imported in tests)
if (
  process.argv[1] &&
  resolve(process.argv[1]) === fileURLToPath(import.meta.url)
) {
  console.log("─── ledger config ───");
  console.log(`  port:              ${config.port}`);
  console.log(`  admin:             ${config.adminPubkey ? config.adminPubkey.slice(0, 12) + "…" : "(none)"}`);
  console.log(`  min_batch_shares:  ${config.minBatchShares}`);
  console.log(`  cooldown:          ${config.cooldownDurationMs}ms`);
  console.log(`  batch_scheduler:   ${config.batchSchedulerIntervalMs > 0 ? `${config.batchSchedulerIntervalMs}ms` : "disabled"}`);
  console.log("─────────────────────");

  const app = await buildApp();

  app.listen({ port: config.port, host: config.host }, (err) => {
    if (err) {
      app.log.error(err);
      process.exit(1);
    }
  });
}
