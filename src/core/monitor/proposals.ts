/**
 * Fix Proposal Generator - fills per-category remediation templates 🛠️
 *
 * Templates are data (data/templates.json). Generation only reads the event,
 * so the same event always yields the same proposal.
 */

import fs from 'node:fs/promises';
import { z } from 'zod';
import { ConfigError, getErrorMessage } from './errors.js';
import { fingerprint, fingerprintLabel, shortFingerprint } from './fingerprint.js';
import type { ErrorEvent, FixProposal, ProposalTemplate, TemplateSet } from './types.js';

export const UNKNOWN_VALUE = 'UNKNOWN — manual review required';
export const PROPOSALS_DIR = '.loghound/proposals';

const TemplateSchema = z
  .object({
    title: z.string().min(1),
    summary: z.string(),
    steps: z.array(z.string()),
    language: z.string().default(''),
    patch: z.string(),
  })
  .strict();

const TemplateSetSchema = z
  .object({
    default: TemplateSchema,
    categories: z.record(TemplateSchema),
  })
  .strict();

export function parseTemplates(input: unknown, source = 'templates'): TemplateSet {
  const parsed = TemplateSetSchema.safeParse(input);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue ? `${issue.path.join('.')}: ${issue.message}` : parsed.error.message;
    throw new ConfigError(`Invalid template file ${source} (${where})`);
  }
  return parsed.data;
}

export async function loadTemplates(filePath: string): Promise<TemplateSet> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, 'utf-8'));
  } catch (error) {
    throw new ConfigError(`Could not read template file ${filePath}: ${getErrorMessage(error)}`, { cause: error });
  }
  return parseTemplates(raw, filePath);
}

/** Replaces `{{name}}` placeholders; unknown names render UNKNOWN_VALUE. */
export function fillTemplate(template: string, values: Readonly<Record<string, string>>): string {
  return template.replace(/\{\{\s*(\w+)\s*\}\}/g, (_, name: string) =>
    Object.hasOwn(values, name) ? (values[name] ?? UNKNOWN_VALUE) : UNKNOWN_VALUE,
  );
}

/** `database_error` → `Database Error` */
export function titleCase(category: string): string {
  return category
    .split('_')
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(' ');
}

export function slugify(value: string, maxLength = 40): string {
  const slug = value
    .replace(/\.[a-z0-9]+$/i, '')
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '');
  return slug.slice(0, maxLength).replace(/-+$/, '') || 'unknown';
}

export function templateValues(event: ErrorEvent, fp: string): Record<string, string> {
  const values: Record<string, string> = {
    ...event.fields,
    category: event.category,
    categoryTitle: titleCase(event.category),
    severity: event.severity,
    message: event.message,
    file: event.location.file,
    fingerprint: fp,
    shortFingerprint: shortFingerprint(fp),
  };
  if (event.location.line !== null) {
    values.line = String(event.location.line);
  }
  return values;
}

export interface ProposalGenerator {
  generate(event: ErrorEvent): FixProposal;
}

export function createProposalGenerator(templates: TemplateSet): ProposalGenerator {
  const pick = (category: string): ProposalTemplate => templates.categories[category] ?? templates.default;

  return {
    generate(event: ErrorEvent): FixProposal {
      const fp = fingerprint(event);
      const template = pick(event.category);
      const values = templateValues(event, fp);
      const categoryTitle = titleCase(event.category);
      const short = shortFingerprint(fp);

      const summary = fillTemplate(template.summary, values);
      const steps = template.steps.map((step) => fillTemplate(step, values));
      const code = fillTemplate(template.patch, values).trimEnd();
      const where = event.location.line === null ? event.location.file : `${event.location.file}:${event.location.line}`;

      const patch = [
        `# ${categoryTitle} fix proposal`,
        '',
        `- **Category:** \`${event.category}\``,
        `- **Severity:** \`${event.severity}\``,
        `- **Location:** \`${where}\``,
        `- **Fingerprint:** \`${fp}\``,
        '',
        '## Summary',
        '',
        summary,
        '',
        '## Suggested steps',
        '',
        ...steps.map((step, i) => `${i + 1}. ${step}`),
        '',
        '## Proposed change',
        '',
        `\`\`\`${template.language}`,
        code,
        '```',
        '',
        '> Generated from a log pattern. It has not been run or tested; review before merging.',
        '',
      ].join('\n');

      return {
        category: event.category,
        fingerprint: fp,
        branch: `fix/${event.category}-${slugify(event.location.file)}-${short.slice(0, 8)}`,
        path: `${PROPOSALS_DIR}/${event.category}-${short}.md`,
        issueTitle: `🐛 [${event.category}] ${fillTemplate(template.title, values)}`,
        title: `🔧 Fix: ${categoryTitle} in ${event.location.file}`,
        commitMessage: `Add ${event.category} fix proposal for ${event.location.file}`,
        patch,
        summary,
        steps,
      };
    },
  };
}

export interface IssueContext {
  environment: string;
}

export interface RenderedIssue {
  title: string;
  body: string;
  labels: string[];
}

const FINGERPRINT_MARKER = (fp: string) => `<!-- loghound:fingerprint=${fp} -->`;

/** Issue title, body and labels for a newly detected error. */
export function renderIssue(event: ErrorEvent, proposal: FixProposal, context: IssueContext): RenderedIssue {
  const where = event.location.line === null ? event.location.file : `${event.location.file}:${event.location.line}`;
  const fields = Object.entries(event.fields);
  const body = [
    '## 🚨 Automated Error Detection',
    '',
    `**Error Type:** \`${event.category}\``,
    `**Severity:** \`${event.severity}\``,
    `**File:** \`${where}\``,
    `**Environment:** \`${context.environment}\``,
    `**Detected:** \`${event.detectedAt}\``,
    event.confidence === 'low' ? '**Confidence:** low (some expected details were missing from the log line)' : '',
    '',
    '### 📋 Error Details',
    '```',
    event.raw,
    '```',
    fields.length > 0 ? ['', '### 🔍 Extracted Fields', ...fields.map(([k, v]) => `- \`${k}\`: ${v}`)].join('\n') : '',
    '',
    '### 🔧 Suggested Fix',
    proposal.summary,
    '',
    ...proposal.steps.map((step, i) => `${i + 1}. ${step}`),
    '',
    '### ✅ Next Steps',
    '1. Review the error details above',
    '2. Review the proposed change, if one is linked',
    '3. Close this issue when resolved',
    '',
    '---',
    '*Created automatically by loghound 🤖*',
    FINGERPRINT_MARKER(proposal.fingerprint),
  ]
    .filter((line, i, all) => !(line === '' && all[i - 1] === ''))
    .join('\n');

  const labels = [...new Set(['automated', ...event.labels, `severity:${event.severity}`, fingerprintLabel(proposal.fingerprint)])];

  return { title: proposal.issueTitle, body, labels };
}

/** Body of an issue once a change has been proposed for it. */
export function appendChangeLink(body: string, changeUrl: string): string {
  return `${body}\n\n### 🔗 Proposed Change\n${changeUrl}`;
}
