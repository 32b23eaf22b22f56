/**
 * Automation primitives the engine needs from the catalog UI.
 * Element misses surface as SurfaceMissError, a lost session as SurfaceFaultError.
 */

export type ActionScope = 'whole-season' | 'single-unit';

export interface ResultCandidate {
  /** Position on the rendered page; passed back to clickActionControl. */
  index: number;
  displayText: string;
  /** Packaging badges shown on the result, e.g. "Single", "With extras". */
  labels: string[];
  /** Carries the "fully cached" marker. */
  fullyAvailable: boolean;
  /** Has a visible instant-fetch control. */
  actionable: boolean;
}

export interface CatalogSurface {
  navigate(url: string): Promise<void>;
  submitQuery(text: string): Promise<void>;
  hasQualifyingIndicator(timeoutMs: number): Promise<boolean>;
  clickActionControl(index: number, scope: ActionScope, timeoutMs: number): Promise<boolean>;
  enablePackagingFilter(): Promise<boolean>;
  listResultCandidates(): Promise<ResultCandidate[]>;
  isUsable(): Promise<boolean>;
}
