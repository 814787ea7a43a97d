import type { Logger } from '../../utils/logger.js';
import type { AdmissionGovernor } from './governor.js';
import { executeWithPolicy, type RetryPolicy } from './retry.js';

/**
 * The single path every GitHub call takes: a governor slot per attempt,
 * retried according to the policy. No slot is held while a retry sleeps.
 */
export class RemoteGateway {
  constructor(
    private readonly governor: AdmissionGovernor,
    private readonly policy: RetryPolicy,
    private readonly logger: Logger
  ) {}

  call<T>(label: string, operation: () => Promise<T>): Promise<T> {
    return executeWithPolicy(() => this.governor.run(operation), this.policy, {
      label,
      logger: this.logger,
    });
  }
}
