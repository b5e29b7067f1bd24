import {
  estimateDebtHours,
  satdToViolation,
  scoreTdg,
  summarizeTdg,
  type ChurnAnalysis,
  type FileComplexity,
  type SatdItem,
  type TdgFileScore,
  type TdgSummary,
  type ViolationDetail
} from '@refactor-gate/domain';

export interface TdgAnalysis {
  files: TdgFileScore[];
  summary: TdgSummary;
}

export interface TdgInput {
  complexity: readonly FileComplexity[];
  churn: ChurnAnalysis;
  satdItems: readonly SatdItem[];
  violations?: readonly ViolationDetail[];
  threshold: number;
}

export function analyzeTdg(input: TdgInput): TdgAnalysis {
  const churnByFile = new Map(input.churn.files.map((file) => [file.path, file.churnScore]));
  const satdByFile = new Map<string, SatdItem[]>();
  for (const item of input.satdItems) {
    const list = satdByFile.get(item.file) ?? [];
    list.push(item);
    satdByFile.set(item.file, list);
  }

  const files = input.complexity
    .map((file) =>
      scoreTdg({
        path: file.path,
        functions: file.functions,
        sloc: file.sloc,
        churnScore: churnByFile.get(file.path) ?? 0,
        satdItems: satdByFile.get(file.path) ?? []
      })
    )
    .sort((left, right) => right.value - left.value || left.path.localeCompare(right.path));

  const debtHours = estimateDebtHours(
    input.complexity.flatMap((file) => file.functions),
    [...(input.violations ?? []), ...input.satdItems.map(satdToViolation)],
    input.threshold
  );

  return { files, summary: summarizeTdg(files, debtHours) };
}
