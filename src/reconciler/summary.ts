import type { ArchiveChange, CardPatch, ErrorRecord, PlannedChange, RunResult } from './types.js';

function singleLine(value: string): string {
  return value.replace(/\s+/g, ' ').trim();
}

function quote(value: string): string {
  return `"${singleLine(value)}"`;
}

const REASON_LABELS: Record<ArchiveChange['reason'], string> = {
  'no-longer-qualifies': 'no longer qualifies',
  duplicate: 'duplicate',
  completed: 'completed',
};

function describePatch(patch: CardPatch): string {
  const parts: string[] = [];
  if (patch.name !== undefined) {
    parts.push(`name -> ${quote(patch.name)}`);
  }
  if (patch.description !== undefined) {
    parts.push('description');
  }
  if (patch.list !== undefined) {
    parts.push(`list -> ${'id' in patch.list ? patch.list.id : quote(patch.list.name)}`);
  }
  if (patch.due !== undefined) {
    parts.push(`due -> ${patch.due ?? 'none'}`);
  }
  if (patch.closed === false) {
    parts.push('reopen');
  }
  return parts.join('; ');
}

function describeChange(change: PlannedChange): string {
  switch (change.type) {
    case 'create':
      return `+ [${change.sourceId}] create ${quote(change.content.name)}`;
    case 'update':
      return `~ [${change.sourceId}] update ${quote(change.cardName)}: ${describePatch(change.patch)}`;
    case 'archive':
      return `- [${change.sourceId}] archive ${quote(change.cardName)} (${REASON_LABELS[change.reason]})`;
  }
}

function describeError(error: ErrorRecord): string {
  return `! [${error.sourceId}] ${error.message}`;
}

/**
 * Render a run result for the terminal
 */
export function formatRunResult(result: RunResult): string {
  const lines: string[] = [];
  lines.push(result.dryRun ? 'Sync plan (dry run, nothing applied)' : 'Sync result');
  lines.push(
    `Created: ${result.created}, Updated: ${result.updated}, ` +
      `Archived: ${result.archived}, Unchanged: ${result.unchanged}, Errors: ${result.errors.length}`
  );

  if (result.changes.length > 0) {
    lines.push('');
    lines.push('Changes');
    for (const change of result.changes) {
      lines.push(describeChange(change));
    }
  }

  if (result.errors.length > 0) {
    lines.push('');
    lines.push('Errors');
    for (const error of result.errors) {
      lines.push(describeError(error));
    }
  }

  return `${lines.join('\n')}\n`;
}
