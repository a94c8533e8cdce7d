/**
 * process_inbox Tool
 * Runs the inbox assistant over unread mail
 */

import type { InboxRunReport, InboxService, MessageResult } from '../services/inbox-service.js';
import type { ProcessInboxInput } from '../schemas/tool-inputs.js';

/**
 * Execute process_inbox tool
 */
export async function executeProcessInbox(
  input: ProcessInboxInput,
  inbox: InboxService
): Promise<InboxRunReport> {
  return inbox.processInbox({ maxMessages: input.maxMessages, dryRun: input.dryRun });
}

function describeResult(result: MessageResult): string {
  switch (result.status) {
    case 'skipped':
      return `⏭️ Skipped: ${result.reasoning ?? 'no response needed'}`;
    case 'failed':
      return `❌ Failed: ${result.error?.message ?? 'unknown error'}`;
    case 'planned':
      return '📝 Reply planned (dry run)';
    case 'drafted':
      return `✅ Draft created (${result.draftId ?? 'unknown id'})`;
  }
}

/**
 * Format result for MCP response
 */
export function formatProcessInboxResult(report: InboxRunReport): string {
  const lines: string[] = [];

  lines.push(`**Inbox run${report.dryRun ? ' (dry run)' : ''}**`);
  lines.push(
    `Processed ${report.processed} messages: ${report.draftsCreated} drafts, ` +
      `${report.meetingsCreated} meetings, ${report.failed} failed`
  );

  for (const result of report.results) {
    lines.push('');
    lines.push(`**${result.subject || '(no subject)'}** from ${result.sender}`);
    lines.push(`   ${describeResult(result)}`);
    if (result.outcome) {
      lines.push(`   Meeting: ${result.outcome.status}${result.eventId ? ` (event ${result.eventId})` : ''}`);
    }
  }

  return lines.join('\n');
}
