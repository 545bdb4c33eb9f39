/**
 * Batch Summary Formatter
 *
 * Plain-text report of a translation run for operators.
 */

import type { BatchTranslation } from '../orchestrator/mapping-orchestrator.js';

export function formatBatchSummary(batch: BatchTranslation): string {
  const lines: string[] = [];
  const total = batch.results.length;

  lines.push('## Connector Translation Summary');
  lines.push(`Run: ${batch.runId}`);
  lines.push(`- Total: ${total}`);
  lines.push(`- Successful: ${batch.successful}`);
  lines.push(`- Failed: ${batch.failed}`);

  if (batch.inputWarnings.length > 0) {
    lines.push('');
    lines.push('### Skipped Input');
    for (const warning of batch.inputWarnings) {
      lines.push(`- ${warning.split('\n').join(' ')}`);
    }
  }

  for (const { result, templateId, successful } of batch.results) {
    lines.push('');
    const template = templateId ? ` -> ${templateId}` : '';
    lines.push(`### ${successful ? '[OK]' : '[FAILED]'} ${result.name}${template}`);

    for (const message of result.mapping_errors) {
      lines.push(`- error: ${message}`);
    }
    for (const message of result.mapping_warnings) {
      lines.push(`- warning: ${message}`);
    }
    if (result.unmapped_configs.length > 0) {
      lines.push(`- unmapped: ${result.unmapped_configs.join(', ')}`);
    }
  }

  return lines.join('\n');
}
