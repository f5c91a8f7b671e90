/**
 * Thrown at construction when pipeline options are unusable.
 * The only error a run lets escape.
 */
export class PipelineConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Pipeline configuration invalid:\n${issues.join('\n')}`);
    this.name = 'PipelineConfigError';
  }
}
