export type CitationRunStatus = 'in_progress' | 'completed';

export interface CitationCounters {
  total_examples: number;
  total_citations: number;
  valid_citations: number;
  misused_citations: number;
  hallucinated_citations: number;
}

export interface CitationAccuracyRun extends CitationCounters {
  run_id: string;
  started_at: string | null;
  completed_at: string | null;
  status: CitationRunStatus;
  overall_accuracy: number;
  results: unknown[];
  config: Record<string, unknown> | null;
}

export interface CitationRunResponse {
  run: CitationAccuracyRun;
}

export interface CitationRunListResponse {
  runs: CitationAccuracyRun[];
}
