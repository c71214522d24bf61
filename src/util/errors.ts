export type ErrorIssue = {
  path?: string;
  message: string;
};

export class AppError extends Error {
  readonly status: number;

  readonly code: string;

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends AppError {
  readonly issues: ErrorIssue[];

  constructor(message: string, issues: ErrorIssue[] = []) {
    super(message, 400, 'validation_failed');
    this.issues = issues;
  }
}

export class NotFoundError extends AppError {
  constructor(message: string) {
    super(message, 404, 'not_found');
  }
}

export class UnsupportedDocumentError extends AppError {
  constructor(fileName: string) {
    super(
      `Unsupported document type for "${fileName}". Upload a .pdf, .txt or .md file.`,
      415,
      'unsupported_document',
    );
  }
}

export class ExtractionError extends AppError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 422, 'extraction_failed', options);
  }
}

export type ScreeningStep = 'extraction' | 'matching' | 'scoring' | 'recommendation';

export class LlmError extends AppError {
  readonly step: ScreeningStep;

  /** Reply text as received, set when the model answered but not with usable JSON. */
  readonly rawResponse?: string;

  constructor(
    step: ScreeningStep,
    message: string,
    { cause, rawResponse }: { cause?: unknown; rawResponse?: string } = {},
  ) {
    super(`LLM ${step} step failed: ${message}`, 502, 'llm_failed', { cause });
    this.step = step;
    this.rawResponse = rawResponse;
  }
}

export const getStatus = (error: unknown): number | undefined => {
  if (error && typeof error === 'object' && 'status' in error) {
    const { status } = error;
    if (typeof status === 'number') {
      return status;
    }
  }
  return undefined;
};
