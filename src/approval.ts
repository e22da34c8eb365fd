import type { ApprovalFallback } from './config.js';
import type { Logger } from './logger.js';

/**
 * Approval gate in front of every write.
 *
 * The core never sees this; the shell asks the approver after computing the
 * new text and before touching the file.
 */
export interface ApprovalRequest {
  path: string;
  oldText: string;
  newText: string;
}

export type Decision =
  | { kind: 'approve' }
  | { kind: 'reject'; reason?: string }
  /** Approved with the approver's own final text. */
  | { kind: 'edit'; text: string };

export interface Approver {
  approve(request: ApprovalRequest): Promise<Decision>;
}

export const autoApprover: Approver = {
  approve: async () => ({ kind: 'approve' }),
};

export interface ApprovalTimeoutOptions {
  timeoutMs: number;
  fallback: ApprovalFallback;
  logger: Logger;
}

function fallbackDecision(fallback: ApprovalFallback, reason: string): Decision {
  return fallback === 'approve' ? { kind: 'approve' } : { kind: 'reject', reason };
}

/**
 * Bound an approver by a timeout. A timeout or a failing approver yields the
 * fallback decision. A timeout of 0 disables the bound.
 */
export function withApprovalTimeout(approver: Approver, options: ApprovalTimeoutOptions): Approver {
  return {
    async approve(request) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<Decision>((resolve) => {
        if (options.timeoutMs <= 0) return;
        timer = setTimeout(() => {
          options.logger.warn(
            { path: request.path, timeoutMs: options.timeoutMs, fallback: options.fallback },
            'approval timed out'
          );
          resolve(fallbackDecision(options.fallback, 'Approval timed out'));
        }, options.timeoutMs);
      });

      try {
        return await Promise.race([approver.approve(request), timeout]);
      } catch (error) {
        options.logger.warn({ path: request.path, err: error, fallback: options.fallback }, 'approver failed');
        return fallbackDecision(options.fallback, 'Approver failed');
      } finally {
        if (timer) clearTimeout(timer);
      }
    },
  };
}
