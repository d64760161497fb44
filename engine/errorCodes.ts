// engine/errorCodes.ts
// Canonical error codes for the scorecard template generator.
//
// Code ranges:
//
//  E300–E399 → Workbook structure (cross-sheet references, table bindings)
//  E500–E599 → Artifact rendering and output
//  E600–E699 → Request / transport issues (download endpoint)

// NOTE:
// - E3xx codes are raised before anything is serialized; no file is written.
// - E5xx codes wrap the underlying error as `cause`.

export const ErrorCodes = {
  // 3xx – Workbook structure
  DANGLING_SHEET_REFERENCE: 'E301',  // formula names a sheet the workbook does not have
  DANGLING_CELL_REFERENCE: 'E302',   // formula names a cell the target sheet never defines
  TABLE_HEADER_MISMATCH: 'E303',
  TABLE_ROW_MISMATCH: 'E304',

  // 5xx – Rendering / output
  OUTPUT_WRITE_FAILED: 'E501',
  ARTIFACT_RENDER_FAILED: 'E502',

  // 6xx – Request
  UNKNOWN_TEMPLATE_ARTIFACT: 'E601'
} as const;

export type ErrorCodeKey = keyof typeof ErrorCodes;
export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// Human-readable descriptions (for logs and API responses)
export const ErrorCodeDescriptions: Record<ErrorCode, string> = {
  [ErrorCodes.DANGLING_SHEET_REFERENCE]: 'Formula references a sheet that is not part of the workbook.',
  [ErrorCodes.DANGLING_CELL_REFERENCE]: 'Formula references a cell that the target sheet does not define.',
  [ErrorCodes.TABLE_HEADER_MISMATCH]: 'Table columns do not match the header cells on its sheet.',
  [ErrorCodes.TABLE_ROW_MISMATCH]: 'Table range does not match the rows populated on its sheet.',

  [ErrorCodes.OUTPUT_WRITE_FAILED]: 'Template file could not be written.',
  [ErrorCodes.ARTIFACT_RENDER_FAILED]: 'Template artifact could not be rendered.',

  [ErrorCodes.UNKNOWN_TEMPLATE_ARTIFACT]: 'Requested template file is not known.'
};

export class TemplateGenerationError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TemplateGenerationError';
    this.code = code;
  }
}

export function isTemplateGenerationError(err: unknown): err is TemplateGenerationError {
  return err instanceof TemplateGenerationError;
}
