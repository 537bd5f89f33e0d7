export interface WorkflowCreator {
  name: string;
  class?: string;
  identifier?: string;
}

/**
 * One workflow from the IWC manifest.
 */
export interface WorkflowDescriptor {
  name: string;
  description: string;
  /** Tool Registry Service id, used to import the workflow into Galaxy. */
  trsId: string;
  iwcId: string;
  release: string;
  license: string;
  categories: string[];
  tags: string[];
  creators: WorkflowCreator[];
}

export interface WorkflowSearchOptions {
  category?: string;
  limit?: number;
}

export interface WorkflowSearchResult {
  category?: string;
  count: number;
  workflows: WorkflowDescriptor[];
}

export interface CategoryListResult {
  count: number;
  categories: string[];
}
