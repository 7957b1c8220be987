export type PipelineStep = 'fetch' | 'score' | 'post' | 'history' | 'remote-log';

/**
 * パイプラインの各ステップで発生するエラーの基底クラス
 */
export class PipelineError extends Error {
  constructor(
    message: string,
    readonly step: PipelineStep,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class FeedFetchError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'fetch', options);
  }
}

export class AiScoringError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'score', options);
  }
}

export class WebhookError extends PipelineError {
  constructor(message: string, readonly status?: number, options?: { cause?: unknown }) {
    super(message, 'post', options);
  }
}

export class HistoryError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'history', options);
  }
}

export class RemoteLogError extends PipelineError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'remote-log', options);
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
