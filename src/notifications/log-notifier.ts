/**
 * Notifier that only logs. Used when no webhook is configured, so a
 * reviewer can pick the review link up from the service log.
 */

import { v4 as uuid } from 'uuid';
import { ApprovalSummary, CompletionSummary, Notifier } from '../domain/collaborators';
import { Logger, logger as rootLogger } from '../logger';

export class LogNotifier implements Notifier {
  private log: Logger;

  constructor(logger: Logger = rootLogger) {
    this.log = logger.child({ component: 'log-notifier' });
  }

  async sendApprovalRequest(runId: string, summary: ApprovalSummary): Promise<{ messageRef: string }> {
    const messageRef = `log_${uuid()}`;
    this.log.info('Approval requested', {
      runId,
      messageRef,
      reviewUrl: summary.reviewUrl,
      gapCount: summary.gapCount,
      insertions: summary.insertions.length,
      projectPlans: summary.projectPlans.length,
    });
    return { messageRef };
  }

  async sendCompletion(runId: string, summary: CompletionSummary): Promise<void> {
    this.log.info('Run completed', { runId, applied: summary.applied, finalScore: summary.finalScore?.overall });
  }
}
