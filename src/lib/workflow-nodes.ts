export const WORKFLOW_STAGES = [
  'init', 'analyze_profile', 'generate_data', 'validate_data',
  'reflect_quality', 'package_output', 'done',
] as const;

export type WorkflowStage = (typeof WORKFLOW_STAGES)[number];

/** Stages that run work; `init` and `done` only bracket a run. */
export type WorkflowNodeKey = Exclude<WorkflowStage, 'init' | 'done'>;

/** Label used in the run's error log, e.g. "Data generation failed: ...". */
export function stageLabel(stage: WorkflowNodeKey): string {
  switch (stage) {
    case 'analyze_profile': return 'Profile analysis';
    case 'generate_data': return 'Data generation';
    case 'validate_data': return 'Data validation';
    case 'reflect_quality': return 'Quality reflection';
    case 'package_output': return 'Output packaging';
  }
}
