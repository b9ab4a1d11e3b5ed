import { randomUUID } from "node:crypto";
import type { TwinDB } from "../storage/db.js";
import { ApprovalRequestId, DecisionId } from "../utils/types.js";
import { NotFoundError } from "../utils/errors.js";
import {
  AlreadyResolvedError,
  statusFor,
  type ApprovalRequest,
  type ApprovalResolution,
  type ApprovalStatus,
} from "./types.js";

interface ApprovalRow {
  id: string;
  decision_id: string;
  status: ApprovalStatus;
  reason: string;
  deadline: number;
  fallback_action: "discard";
  resolution_text: string | null;
  resolved_by: string | null;
  created_at: number;
  resolved_at: number | null;
}

const DEFAULT_PAGE_SIZE = 100;

/**
 * Durable store of decisions awaiting a human. Resolution and expiry are
 * conditional updates out of `pending`, so exactly one of any set of racing
 * callers wins and the rest get `AlreadyResolvedError`.
 */
export class ApprovalQueue {
  private readonly db;

  constructor(private readonly twinDb: TwinDB) {
    this.db = twinDb.raw();
  }

  enqueue(decisionId: DecisionId, deadline: number, reason: string): ApprovalRequest {
    const id = ApprovalRequestId.make(randomUUID());
    this.db
      .prepare(
        `INSERT INTO approval_requests (id, decision_id, status, reason, deadline, created_at)
         VALUES (?, ?, 'pending', ?, ?, ?)`,
      )
      .run(id, decisionId, reason, deadline, Date.now());
    return this.require(id);
  }

  /**
   * Requests still open at `now`, oldest first. Overdue requests are left out
   * even before a sweep has expired them. Each iteration starts a fresh walk
   * and reads the table a page at a time, so it sees the state at iteration
   * time and never keeps a statement open between pages.
   */
  listPending(now: number, pageSize = DEFAULT_PAGE_SIZE): Iterable<ApprovalRequest> {
    const first = this.db.prepare(
      `SELECT * FROM approval_requests WHERE status = 'pending' AND deadline > ?
       ORDER BY created_at ASC, id ASC LIMIT ?`,
    );
    const next = this.db.prepare(
      `SELECT * FROM approval_requests
       WHERE status = 'pending' AND deadline > ? AND (created_at > ? OR (created_at = ? AND id > ?))
       ORDER BY created_at ASC, id ASC LIMIT ?`,
    );

    return {
      *[Symbol.iterator](): Iterator<ApprovalRequest> {
        let cursor: { createdAt: number; id: string } | null = null;
        for (;;) {
          const rows = (
            cursor === null
              ? first.all(now, pageSize)
              : next.all(now, cursor.createdAt, cursor.createdAt, cursor.id, pageSize)
          ) as ApprovalRow[];
          for (const row of rows) yield toRequest(row);

          const last = rows[rows.length - 1];
          if (!last || rows.length < pageSize) return;
          cursor = { createdAt: last.created_at, id: last.id };
        }
      },
    };
  }

  countPending(): number {
    const row = this.db
      .prepare("SELECT COUNT(*) AS cnt FROM approval_requests WHERE status = 'pending'")
      .get() as { cnt: number };
    return row.cnt;
  }

  /**
   * Resolve a request that is still pending and not yet past its deadline at
   * `now`. An overdue request reports as expired whether or not a sweep has
   * marked it yet.
   */
  resolve(requestId: ApprovalRequestId, resolution: ApprovalResolution, now: number): ApprovalRequest {
    const { action, operator } = resolution;
    const result = this.db
      .prepare(
        `UPDATE approval_requests
         SET status = ?, resolution_text = ?, resolved_by = ?, resolved_at = ?
         WHERE id = ? AND status = 'pending' AND deadline > ?`,
      )
      .run(
        statusFor(action),
        action.kind === "edit" ? action.text : null,
        operator,
        now,
        requestId,
        now,
      );
    if (result.changes === 0) this.raiseLost(requestId);
    return this.require(requestId);
  }

  /**
   * Expire every pending request whose deadline is at or before `now`.
   * `onExpired` runs inside the same transaction as each request's update, so
   * a throw there leaves that request pending.
   */
  expire(now: number, onExpired?: (request: ApprovalRequest) => void): ApprovalRequest[] {
    const overdue = this.db
      .prepare(
        `SELECT id FROM approval_requests WHERE status = 'pending' AND deadline <= ?
         ORDER BY deadline ASC, id ASC`,
      )
      .all(now) as Array<{ id: string }>;
    const mark = this.db.prepare(
      `UPDATE approval_requests SET status = 'expired', resolved_at = ?
       WHERE id = ? AND status = 'pending'`,
    );

    const expired: ApprovalRequest[] = [];
    for (const { id } of overdue) {
      const request = this.twinDb.transaction(() => {
        if (mark.run(now, id).changes === 0) return null;
        const updated = this.require(ApprovalRequestId.make(id));
        onExpired?.(updated);
        return updated;
      });
      if (request) expired.push(request);
    }
    return expired;
  }

  get(requestId: ApprovalRequestId): ApprovalRequest | null {
    const row = this.db
      .prepare("SELECT * FROM approval_requests WHERE id = ?")
      .get(requestId) as ApprovalRow | undefined;
    return row ? toRequest(row) : null;
  }

  require(requestId: ApprovalRequestId): ApprovalRequest {
    const request = this.get(requestId);
    if (!request) throw new NotFoundError("approval request", requestId);
    return request;
  }

  pendingForDecision(decisionId: DecisionId): ApprovalRequest | null {
    const row = this.db
      .prepare("SELECT * FROM approval_requests WHERE decision_id = ? AND status = 'pending'")
      .get(decisionId) as ApprovalRow | undefined;
    return row ? toRequest(row) : null;
  }

  private raiseLost(requestId: ApprovalRequestId): never {
    const current = this.get(requestId);
    if (!current) throw new NotFoundError("approval request", requestId);
    throw new AlreadyResolvedError(requestId, current.status === "pending" ? "expired" : current.status);
  }
}

function toRequest(row: ApprovalRow): ApprovalRequest {
  return {
    id: ApprovalRequestId.make(row.id),
    decisionId: DecisionId.make(row.decision_id),
    status: row.status,
    reason: row.reason,
    deadline: row.deadline,
    fallbackAction: row.fallback_action,
    resolutionText: row.resolution_text,
    resolvedBy: row.resolved_by,
    createdAt: row.created_at,
    resolvedAt: row.resolved_at,
  };
}
