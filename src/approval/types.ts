import type { ApprovalRequestId, DecisionId } from "../utils/types.js";
import type { ApprovalAction } from "../engine/types.js";
import { TwinError } from "../utils/errors.js";

export type ApprovalStatus = "pending" | "approved" | "edited" | "denied" | "expired";

/** What happens to the decision when nobody answers in time. Only discard exists today. */
export type FallbackAction = "discard";

export interface ApprovalRequest {
  readonly id: ApprovalRequestId;
  readonly decisionId: DecisionId;
  readonly status: ApprovalStatus;
  readonly reason: string;
  readonly deadline: number;
  readonly fallbackAction: FallbackAction;
  readonly resolutionText: string | null;
  readonly resolvedBy: string | null;
  readonly createdAt: number;
  readonly resolvedAt: number | null;
}

export interface ApprovalResolution {
  readonly action: ApprovalAction;
  readonly operator: string;
}

export class AlreadyResolvedError extends TwinError {
  constructor(
    readonly requestId: ApprovalRequestId,
    readonly status: ApprovalStatus,
  ) {
    super("already_resolved", `Approval request ${requestId} is already ${status}`);
  }
}

export function statusFor(action: ApprovalAction): Exclude<ApprovalStatus, "pending" | "expired"> {
  switch (action.kind) {
    case "approve":
      return "approved";
    case "edit":
      return "edited";
    case "deny":
      return "denied";
  }
}
