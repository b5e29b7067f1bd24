import { normalizePath } from '@refactor-gate/domain';

import type { ContextFile, DeepContext } from './model.js';

function fixed(value: number, digits = 1): string {
  return value.toFixed(digits);
}

function renderFile(file: ContextFile): string {
  const lines = [
    `### ./${file.path}`,
    '',
    `**Defect Score**: ${fixed(file.defectScore, 3)} | **SATD Items**: ${file.satdItems} | **Dead Code Items**: ${file.deadCodeItems} | **TDG**: ${fixed(file.tdg, 3)} (${file.tdgBand})`
  ];
  if (file.functions.length > 0) {
    lines.push('');
    for (const fn of file.functions) {
      lines.push(`- **Function**: \`${fn.name}\` [complexity: ${fn.cyclomatic}]`);
    }
  }
  return lines.join('\n');
}

function table(header: string[], rows: string[][]): string {
  return [
    `| ${header.join(' | ')} |`,
    `| ${header.map(() => '---').join(' | ')} |`,
    ...rows.map((row) => `| ${row.join(' | ')} |`)
  ].join('\n');
}

/** Sections in a fixed order; each file under the project structure is its own `###` section. */
export function renderDeepContextMarkdown(context: DeepContext): string {
  const sections: string[] = [];
  const { summary, scorecard } = context;

  sections.push('# Deep Context Analysis');
  sections.push(
    [
      '## Executive Summary',
      '',
      `**Generated:** ${context.generatedAt}`,
      `**Project:** ${context.projectPath}`,
      `**Toolchain:** ${context.toolchain}`,
      `**Files Analyzed:** ${summary.totalFiles}`,
      `**Functions Analyzed:** ${summary.totalFunctions}`,
      `**Functions Over Threshold (${context.threshold}):** ${summary.functionsOverThreshold}`
    ].join('\n')
  );
  sections.push(
    [
      '## Quality Scorecard',
      '',
      `- **Overall Health**: ${fixed(scorecard.overallHealth)}%`,
      `- **Maintainability Index**: ${fixed(scorecard.maintainabilityIndex)}%`,
      `- **Complexity Score**: ${fixed(scorecard.complexityScore)}%`,
      `- **Technical Debt**: ${fixed(scorecard.technicalDebtHours)} hours`
    ].join('\n')
  );

  sections.push('## Project Structure');
  if (context.files.length === 0) {
    sections.push('No source files found.');
  }
  sections.push(...context.files.map(renderFile));

  sections.push('## Complexity Hotspots');
  sections.push(
    context.complexityHotspots.length === 0
      ? 'No functions found.'
      : table(
          ['Function', 'File', 'Line', 'Cyclomatic', 'Cognitive'],
          context.complexityHotspots.map((hotspot) => [
            `\`${hotspot.function}\``,
            hotspot.file,
            String(hotspot.line),
            String(hotspot.cyclomatic),
            String(hotspot.cognitive)
          ])
        )
  );

  const churn = context.churn;
  sections.push(
    [
      '## Code Churn',
      '',
      `- **Period**: ${churn.periodDays} days`,
      `- **Total Commits**: ${churn.summary.totalCommits}`,
      `- **Files Changed**: ${churn.summary.totalFilesChanged}`,
      `- **Hotspots**: ${churn.summary.hotspotFiles.length === 0 ? 'none' : churn.summary.hotspotFiles.join(', ')}`
    ].join('\n')
  );

  const satd = context.satd.summary;
  sections.push(
    [
      '## Technical Debt (SATD)',
      '',
      `- **Total Items**: ${satd.totalItems}`,
      `- **Files With SATD**: ${satd.filesWithSatd}`,
      `- **By Severity**: high ${satd.bySeverity.high}, medium ${satd.bySeverity.medium}, low ${satd.bySeverity.low}`
    ].join('\n')
  );

  const dead = context.deadCode.summary;
  sections.push(
    [
      '## Dead Code',
      '',
      `- **Files With Dead Code**: ${dead.filesWithDeadCode}`,
      `- **Dead Lines**: ${dead.totalDeadLines} (${fixed(dead.deadPercentage)}%)`,
      `- **Dead Functions**: ${dead.deadFunctions}`,
      `- **Unreachable Blocks**: ${dead.unreachableBlocks}`
    ].join('\n')
  );

  sections.push('## Predicted Defects');
  sections.push(
    context.predictedDefects.length === 0
      ? 'No files show defect risk.'
      : context.predictedDefects
          .map((defect, index) => `${index + 1}. ${defect.file} (score ${fixed(defect.defectScore, 3)}): ${defect.factors.join(', ')}`)
          .join('\n')
  );

  sections.push('## Recommendations');
  sections.push(
    context.recommendations.length === 0
      ? 'No recommendations.'
      : context.recommendations
          .map((rec, index) => `${index + 1}. **${rec.title}** (Priority: ${rec.priority})\n   ${rec.description}`)
          .join('\n')
  );

  return `${sections.join('\n\n')}\n`;
}

/**
 * The `###` section whose heading names `file`, up to the next heading of
 * level three or higher. An exact `./<file>` heading wins over a suffix match.
 */
export function extractFileContext(markdown: string, file: string): string | null {
  const target = normalizePath(file);
  const lines = markdown.split('\n');
  const headings = lines
    .map((line, index) => ({ line, index }))
    .filter((entry) => entry.line.startsWith('### '))
    .map((entry) => ({ ...entry, name: entry.line.slice(4).trim() }));

  const exact = headings.find((heading) => heading.name === `./${target}` || heading.name === target);
  const match =
    exact ??
    headings.find((heading) => heading.name.endsWith(`/${target}`));
  if (!match) {
    return null;
  }

  const body: string[] = [match.line];
  for (const line of lines.slice(match.index + 1)) {
    if (/^#{1,3} /.test(line)) {
      break;
    }
    body.push(line);
  }
  return body.join('\n').trim();
}
