import type { OutputFormat, Outcome } from '../types/results.js';
import { DIVIDER, RULE, formatErrorText, toJson, truncate } from '../format/text.js';
import type { CategoryListResult, WorkflowDescriptor, WorkflowSearchResult } from './types.js';

const DESCRIPTION_LENGTH = 150;
const TAGS_SHOWN = 5;

function formatWorkflow(workflow: WorkflowDescriptor, position: number): string[] {
  const lines = [`\nWorkflow ${position}:`, `  Name: ${workflow.name}`];
  if (workflow.description) {
    lines.push(`  Description: ${truncate(workflow.description, DESCRIPTION_LENGTH)}`);
  }
  if (workflow.categories.length > 0) {
    lines.push(`  Categories: ${workflow.categories.join(', ')}`);
  }
  lines.push(`  TRS ID: ${workflow.trsId || 'N/A'}`);
  if (workflow.iwcId) {
    lines.push(`  IWC ID: ${workflow.iwcId}`);
  }
  if (workflow.release) {
    lines.push(`  Release: v${workflow.release}`);
  }
  if (workflow.tags.length > 0) {
    lines.push(`  Tags: ${workflow.tags.slice(0, TAGS_SHOWN).join(', ')}`);
  }
  lines.push(DIVIDER);
  return lines;
}

export function formatWorkflowSearch(result: Outcome<WorkflowSearchResult>, format: OutputFormat): string {
  if (format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }

  const lines: string[] = [];
  if (result.category) {
    lines.push(`Category Filter: ${result.category}`);
  }
  lines.push(`Workflows Found: ${result.count}`);
  if (result.workflows.length > 0) {
    lines.push(`\n${RULE}`, 'WORKFLOWS', RULE);
    result.workflows.forEach((workflow, i) => lines.push(...formatWorkflow(workflow, i + 1)));
  }
  return lines.join('\n');
}

export function formatCategoryList(result: Outcome<CategoryListResult>, format: OutputFormat): string {
  if (format === 'json') {
    return toJson(result);
  }
  if (!result.success) {
    return formatErrorText(result);
  }
  return [`Available Workflow Categories (${result.count}):`, RULE, ...result.categories.map((c) => `  - ${c}`)].join('\n');
}
