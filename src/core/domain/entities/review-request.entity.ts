export class ReviewFile {
  constructor(
    public readonly path: string,
    public readonly diff: string,
    public readonly content?: string,
  ) {}
}

export interface ReviewRequest {
  repoName: string;
  prNumber: number;
  files: ReviewFile[];
  /** Agent names to run. Defaults to every enabled agent. */
  agents?: string[];
}

export interface ReviewHandle {
  id: string;
  repoName: string;
  prNumber: number;
  startedAt: Date;
  tasksTotal: number;
}
