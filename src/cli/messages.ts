import type { CycleSummary } from '../core/monitor/types.js';

export const CLI_MESSAGES = {
  DESCRIPTION: 'Watch an application log and file GitHub issues for new errors',
  OPTIONS: {
    CONFIG: 'Path to loghound.config.json',
    VERBOSE: 'Print debug output',
  },
  COMMANDS: {
    STATUS: 'Show the processing state without scanning',
    SCAN: 'Run exactly one scan cycle',
    SCAN_DRY_RUN: 'Use an in-memory tracker and leave the state file untouched',
    MONITOR: 'Scan repeatedly until interrupted',
    SIMULATE: 'Append one sample line per error pattern to the monitored log',
    SIMULATE_CATEGORY: 'Only this category (repeatable)',
    SETUP: 'Create the log file and a default configuration',
    SETUP_REPO: 'Target repository ("owner/name")',
    SETUP_LOG: 'Log file to monitor',
  },
  STATUS: {
    TITLE: '\n📊 loghound status\n',
    MISSING_LOG: 'missing',
    NEVER: 'never',
  },
  SCAN: {
    START: (logPath: string) => `\n🔍 Scanning ${logPath}...\n`,
    DRY_RUN: '🧪 Dry run: nothing is sent to GitHub and the state file is not written.',
    WOULD_FILE: '\n📝 Would file:',
    NOTHING_NEW: '✨ No new errors.',
  },
  MONITOR: {
    STOPPING: '\n👋 Stopping after the current step...',
  },
  SIMULATE: {
    WROTE: (count: number, logPath: string) => `🧪 Appended ${count} sample line(s) to ${logPath}`,
    NONE: '⚠️ No pattern matched the requested categories.',
  },
  SETUP: {
    LOG_READY: (logPath: string) => `📄 Log file ready: ${logPath}`,
    CONFIG_CREATED: (configPath: string) => `✨ Created ${configPath}`,
    CONFIG_EXISTS: (configPath: string) => `ℹ️ ${configPath} already exists; left unchanged.`,
    TOKEN_HINT: '💡 Set GITHUB_TOKEN (in .env.local or the environment) before running scan or monitor.',
  },
  ERRORS: {
    FAILED: (command: string) => `❌ ${command} failed:`,
  },
} as const;

export function formatSummary(summary: CycleSummary): string {
  const parts = [
    `status=${summary.status}`,
    `lines=${summary.linesRead}`,
    `errors=${summary.classified}`,
    `duplicates=${summary.duplicates}`,
    `created=${summary.created}`,
    `linked=${summary.linked}`,
    `changes=${summary.changes}`,
    `deferred=${summary.deferred}`,
    `rejected=${summary.rejected}`,
    `offset=${summary.offset}`,
  ];
  if (summary.batchFull) parts.push('batch full');
  if (summary.rotated) parts.push('rotated');
  return parts.join(' ');
}
