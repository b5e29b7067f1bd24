export type Toolchain = 'rust' | 'deno' | 'python-uv' | 'go';

export type ViolationSeverity = 'error' | 'warning' | 'note' | 'info';

export type SatdSeverity = 'high' | 'medium' | 'low';

export type SatdCategory = 'design' | 'defect' | 'requirement' | 'refactor' | 'quality';

export type Confidence = 'High' | 'Medium' | 'Low';

export interface QualityProfile {
  coverageMin: number;
  complexityMax: number;
  complexityTarget: number;
  satdAllowed: number;
}

export interface QualityMetrics {
  totalViolations: number;
  filesWithIssues: number;
  totalFiles: number;
  coveragePercent: number;
  maxComplexity: number;
  functionsWithHighComplexity: number;
  totalFunctions: number;
  satdCount: number;
}

export interface ViolationDetail {
  file: string;
  line: number;
  column: number;
  endLine: number;
  endColumn: number;
  lintName: string;
  message: string;
  severity: ViolationSeverity;
  suggestion?: string;
  machineApplicable: boolean;
}

export type FixStrategy =
  | { kind: 'ExtractFunction' }
  | { kind: 'SimplifyCondition' }
  | { kind: 'RemoveDeadCode' }
  | { kind: 'AddTest' }
  | { kind: 'ApplySuggestion'; suggestion: string };

export interface PlannedViolation {
  lintName: string;
  line: number;
  column: number;
  message: string;
  fixStrategy: FixStrategy;
}

export interface FunctionInfo {
  name: string;
  line: number;
  endLine: number;
  cyclomatic: number;
  cognitive: number;
}

export interface AstMetadata {
  functions: FunctionInfo[];
  imports: string[];
  structureHash: string;
}

export interface FileRewritePlan {
  filePath: string;
  violations: PlannedViolation[];
  astMetadata: AstMetadata;
  newContent: string;
}

export const REFACTOR_PHASES = [
  'Initialization',
  'LintFixes',
  'BuildFixes',
  'ComplexityReduction',
  'SatdCleanup',
  'CoverageDriven',
  'QualityValidation',
  'Complete'
] as const;

export type RefactorPhase = (typeof REFACTOR_PHASES)[number];

export interface RefactorProgress {
  overallCompletionPercent: number;
  lintCompletionPercent: number;
  complexityCompletionPercent: number;
  satdCompletionPercent: number;
  coverageCompletionPercent: number;
  filesCompleted: number;
  filesRemaining: number;
  estimatedTimeRemainingMinutes: number;
  qualityGatesPassed: string[];
  qualityGatesRemaining: string[];
  currentPhase: RefactorPhase;
}

export interface RefactorState {
  iteration: number;
  startTime: string;
  contextGenerated: boolean;
  contextPath: string;
  currentFile: string | null;
  filesCompleted: string[];
  qualityMetrics: QualityMetrics;
  progress: RefactorProgress;
  satdBaseline: number;
  lastTarget: string | null;
  lastMetrics: QualityMetrics | null;
}

export interface FileViolationSummary {
  defectDensity: number;
  totalViolations: number;
}

export interface LintHotspotResult {
  totalProjectViolations: number;
  summaryByFile: Record<string, FileViolationSummary>;
  hotspot: {
    file: string;
    defectDensity: number;
    totalViolations: number;
    violations: ViolationDetail[];
  } | null;
  allViolations: ViolationDetail[];
}

export interface SelectionFilters {
  include: string[];
  exclude: string[];
}

export type RefactorMode =
  | { kind: 'Normal' }
  | { kind: 'SingleFile'; file: string }
  | { kind: 'TestDriven'; testFile: string; testName?: string }
  | { kind: 'IssueDriven'; issueUrl: string }
  | { kind: 'BugReport'; reportPath: string };

export type SelectionTier = 'lint' | 'build' | 'coverage' | 'complexity' | 'satd';

export interface SelectedTarget {
  kind: 'selected';
  file: string;
  tier: SelectionTier;
  reason: string;
}

export interface Exhausted {
  kind: 'exhausted';
  reason: string;
}

export type Selection = SelectedTarget | Exhausted;

export type RefactorStatus =
  | 'Complete'
  | 'BudgetExhausted'
  | 'BuildBroken'
  | 'NoProgress'
  | 'AwaitingRewrite'
  | 'Canceled';

export interface SatdItem {
  file: string;
  line: number;
  marker: string;
  category: SatdCategory;
  severity: SatdSeverity;
  text: string;
}

export interface FileComplexity {
  path: string;
  functions: FunctionInfo[];
  maxCyclomatic: number;
  maxCognitive: number;
  sloc: number;
}

export interface CompilationError {
  file: string;
  line: number;
  column: number;
  code: string | null;
  message: string;
}

export interface IssueKeyword {
  category: string;
  weight: number;
  matches: string[];
}

export interface IssueContext {
  title: string;
  summary: string;
  keywords: IssueKeyword[];
  priorityAreas: string[];
  files: string[];
}
