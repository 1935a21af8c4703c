export interface BatchIndexResult {
  /** True when no chunk failed */
  success: boolean;
  indexedCount: number;
  failedCount: number;
  errors: string[];
}
