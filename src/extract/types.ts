export interface ExtractionResult {
  signature: string;
  /** Template variables: capture groups by index ("0", "1", ...) and, where known, "date". */
  variables: Record<string, string>;
}

export interface PostProcessOptions {
  pattern?: string;
  template?: string;
  dateFormat?: boolean;
}
