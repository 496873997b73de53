import { randomUUID } from 'node:crypto';
import { createLogger } from './log';

export type MutationKind = 'rename' | 'migrate' | 'patch';

export class ApprovalError extends Error {
  constructor(message: string, readonly requestId: string) {
    super(message);
    this.name = 'ApprovalError';
  }
}

/**
 * A pending mutation with its own response channel. Each request owns a
 * single decision; two requests never share one.
 */
export interface MutationRequest {
  readonly id: string;
  readonly kind: MutationKind;
  readonly summary: string;
  readonly settled: boolean;
  /** Throws ApprovalError when the request was already answered. */
  respond(approved: boolean): void;
  decision(): Promise<boolean>;
}

export function createMutationRequest(kind: MutationKind, summary: string): MutationRequest {
  const id = randomUUID();
  let settled = false;
  let resolve: (approved: boolean) => void = () => undefined;
  const pending = new Promise<boolean>((r) => {
    resolve = r;
  });
  return {
    id,
    kind,
    summary,
    get settled() {
      return settled;
    },
    respond(approved: boolean) {
      if (settled) throw new ApprovalError(`mutation request ${id} was already answered`, id);
      settled = true;
      resolve(approved);
    },
    decision: () => pending,
  };
}

/** Receives the dry-run preview and answers the request, now or later. */
export type Approver<T> = (request: MutationRequest, preview: T) => void | Promise<void>;

export interface GatedOutcome<T> {
  approved: boolean;
  preview: T;
  /** The applied result, or the preview when not approved. */
  result: T;
}

/** Preview with `dryRun`, ask `approver`, and run `apply` only on approval. */
export async function runGatedMutation<T>(
  request: MutationRequest,
  approver: Approver<T>,
  dryRun: () => T,
  apply: () => T,
): Promise<GatedOutcome<T>> {
  const log = createLogger({ component: 'approval', requestId: request.id, kind: request.kind });
  const preview = dryRun();
  await approver(request, preview);
  const approved = await request.decision();
  log.info(approved ? 'mutation_approved' : 'mutation_declined', { summary: request.summary });
  if (!approved) return { approved, preview, result: preview };
  return { approved, preview, result: apply() };
}

/** Approver that answers every request the same way. */
export function fixedApprover<T>(approved: boolean): Approver<T> {
  return (request) => request.respond(approved);
}
