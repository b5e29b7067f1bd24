export const TOOL_NAME = 'refactor-gate';
export const TOOL_VERSION = '0.1.0';
export const SARIF_SCHEMA = 'https://json.schemastore.org/sarif-2.1.0.json';

export type SarifLevel = 'error' | 'warning' | 'note' | 'none';

export interface SarifRule {
  id: string;
  shortDescription: { text: string };
  fullDescription?: { text: string };
  defaultConfiguration: { level: SarifLevel };
  properties?: { tags: string[] };
}

export interface SarifLocation {
  physicalLocation: {
    artifactLocation: { uri: string };
    region: { startLine: number; endLine?: number; startColumn?: number };
  };
}

export interface SarifResult {
  ruleId: string;
  level: SarifLevel;
  message: { text: string };
  locations: SarifLocation[];
  properties?: Record<string, unknown>;
}

export interface SarifLog {
  $schema: string;
  version: '2.1.0';
  runs: Array<{
    tool: { driver: { name: string; version: string; rules: SarifRule[] } };
    results: SarifResult[];
    properties?: Record<string, unknown>;
  }>;
}

export function sarifRule(id: string, text: string, level: SarifLevel, tags: string[], description?: string): SarifRule {
  return {
    id,
    shortDescription: { text },
    ...(description ? { fullDescription: { text: description } } : {}),
    defaultConfiguration: { level },
    properties: { tags }
  };
}

export function sarifLocation(uri: string, startLine: number, endLine?: number, startColumn?: number): SarifLocation {
  return {
    physicalLocation: {
      artifactLocation: { uri },
      region: {
        startLine: Math.max(1, startLine),
        ...(endLine !== undefined ? { endLine: Math.max(1, endLine) } : {}),
        ...(startColumn !== undefined ? { startColumn: Math.max(1, startColumn) } : {})
      }
    }
  };
}

/** A single-run log; rules that no result references are dropped. */
export function sarifLog(rules: readonly SarifRule[], results: readonly SarifResult[], properties?: Record<string, unknown>): SarifLog {
  const used = new Set(results.map((result) => result.ruleId));
  return {
    $schema: SARIF_SCHEMA,
    version: '2.1.0',
    runs: [
      {
        tool: { driver: { name: TOOL_NAME, version: TOOL_VERSION, rules: rules.filter((rule) => used.has(rule.id)) } },
        results: [...results],
        ...(properties ? { properties } : {})
      }
    ]
  };
}
