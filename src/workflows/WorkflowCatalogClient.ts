/**
 * Client for the IWC workflow manifest: one static JSON document listing
 * every repository and its Galaxy workflows. The manifest offers no
 * server-side filtering, so every call fetches it whole and filters here.
 */

import { z } from 'zod';
import type { ResolvedConfig } from '../config/types.js';
import type { HttpClient } from '../http/HttpClient.js';
import { httpError, networkError, parseJsonBody, unexpectedResponse } from '../http/HttpClient.js';
import { lenient, parseEach } from '../http/lenient.js';
import type { ErrorResult, Outcome } from '../types/results.js';
import { usageError } from '../types/results.js';
import type { CategoryListResult, WorkflowDescriptor, WorkflowSearchOptions, WorkflowSearchResult } from './types.js';

const CreatorSchema = z
  .object({
    name: lenient(z.string()),
    class: lenient(z.string()),
    identifier: lenient(z.string()),
  })
  .passthrough();

const ManifestWorkflowSchema = z
  .object({
    trsID: lenient(z.string()),
    iwcID: lenient(z.string()),
    collections: lenient(z.array(z.string())),
    tests: z.unknown().optional(),
    definition: lenient(
      z
        .object({
          name: lenient(z.string()),
          annotation: lenient(z.string()),
          release: lenient(z.union([z.string(), z.number().transform(String)])),
          license: lenient(z.string()),
          creator: lenient(z.array(z.unknown())),
          tags: lenient(z.array(z.string())),
        })
        .passthrough()
    ),
  })
  .passthrough();

const RepositorySchema = z.object({ workflows: lenient(z.array(z.unknown())) }).passthrough();

const ManifestSchema = z.array(z.unknown());

type ManifestWorkflow = z.infer<typeof ManifestWorkflowSchema>;

function toDescriptor(workflow: ManifestWorkflow): WorkflowDescriptor {
  const { definition } = workflow;
  return {
    name: definition?.name ?? 'Unknown',
    description: definition?.annotation ?? '',
    trsId: workflow.trsID ?? '',
    iwcId: workflow.iwcID ?? '',
    release: definition?.release ?? '',
    license: definition?.license ?? '',
    categories: workflow.collections ?? [],
    tags: definition?.tags ?? [],
    creators: parseEach(CreatorSchema, definition?.creator ?? []).map((creator) => ({
      name: creator.name ?? '',
      ...(creator.class ? { class: creator.class } : {}),
      ...(creator.identifier ? { identifier: creator.identifier } : {}),
    })),
  };
}

/**
 * Category match policy: trimmed, case-insensitive equality with one of the
 * workflow's categories. Substrings do not match.
 */
export function matchesCategory(workflow: WorkflowDescriptor, category: string): boolean {
  const wanted = category.trim().toLowerCase();
  return workflow.categories.some((c) => c.trim().toLowerCase() === wanted);
}

export class WorkflowCatalogClient {
  constructor(
    private readonly http: HttpClient,
    private readonly config: ResolvedConfig['workflows']
  ) {}

  /**
   * Fetch the manifest and keep only workflows that declare tests; the rest
   * are treated as incomplete.
   */
  async fetchWorkflows(): Promise<{ ok: true; workflows: WorkflowDescriptor[] } | { ok: false; error: ErrorResult }> {
    const url = this.config.manifestUrl;
    const outcome = await this.http.get(url);

    switch (outcome.kind) {
      case 'transport-error':
        return { ok: false, error: networkError(outcome.detail, url) };
      case 'http-error':
        return { ok: false, error: httpError(outcome.status, outcome.statusText, 'The workflow manifest may be temporarily unavailable; try again later') };
      case 'no-content':
        return { ok: true, workflows: [] };
      case 'body':
        break;
    }

    const json = parseJsonBody(outcome.body);
    if (!json.ok) {
      return { ok: false, error: unexpectedResponse(json.detail, url) };
    }
    const manifest = ManifestSchema.safeParse(json.value);
    if (!manifest.success) {
      return { ok: false, error: unexpectedResponse('expected a JSON array of workflow repositories', url) };
    }

    // Entries are checked one at a time; a malformed one is skipped.
    const workflows = parseEach(RepositorySchema, manifest.data)
      .flatMap((repo) => parseEach(ManifestWorkflowSchema, repo.workflows ?? []))
      .filter((workflow) => workflow.tests !== undefined)
      .map(toDescriptor);
    return { ok: true, workflows };
  }

  async search(options: WorkflowSearchOptions = {}): Promise<Outcome<WorkflowSearchResult>> {
    const { category, limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 0)) {
      return usageError('limit must be a non-negative integer', 'Pass a whole number such as --limit 10');
    }

    const fetched = await this.fetchWorkflows();
    if (!fetched.ok) return fetched.error;

    let workflows = fetched.workflows;
    if (category) {
      workflows = workflows.filter((workflow) => matchesCategory(workflow, category));
    }
    if (limit !== undefined) {
      workflows = workflows.slice(0, limit);
    }

    return {
      success: true,
      ...(category ? { category } : {}),
      count: workflows.length,
      workflows,
    };
  }

  async listCategories(): Promise<Outcome<CategoryListResult>> {
    const fetched = await this.fetchWorkflows();
    if (!fetched.ok) return fetched.error;

    const categories = [...new Set(fetched.workflows.flatMap((workflow) => workflow.categories))].sort((a, b) =>
      a.localeCompare(b)
    );
    return { success: true, count: categories.length, categories };
  }
}
