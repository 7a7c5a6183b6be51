import type { ScenarioResult, Verdict } from '../orchestrator/types.js';

export interface ReportOptions {
  /** ANSI colours (default false) */
  color?: boolean;
  title?: string;
  /** Wall-clock time of the run; defaults to the sum of scenario durations */
  durationMs?: number;
}

export interface ReportSummary {
  total: number;
  passed: number;
  failed: number;
  errors: number;
}

const MARKS: Record<Verdict, { symbol: string; color: string }> = {
  pass: { symbol: '✓', color: '32' },
  fail: { symbol: '✗', color: '31' },
  error: { symbol: '!', color: '33' },
};

export function summarize(results: readonly ScenarioResult[]): ReportSummary {
  return {
    total: results.length,
    passed: results.filter(result => result.verdict === 'pass').length,
    failed: results.filter(result => result.verdict === 'fail').length,
    errors: results.filter(result => result.verdict === 'error').length,
  };
}

/**
 * Human-readable report: one line per scenario grouped by suite, its
 * diagnostics underneath, then a summary and the list of scenarios that
 * did not pass.
 */
export function formatReport(results: readonly ScenarioResult[], options: ReportOptions = {}): string {
  const paint = (code: string, text: string): string => (options.color ? `\x1b[${code}m${text}\x1b[0m` : text);
  const lines: string[] = [];

  lines.push('='.repeat(70));
  lines.push(`  ${options.title ?? 'IRC Conformance Report'}`);
  lines.push('='.repeat(70));
  lines.push('');

  const suites = new Map<string, ScenarioResult[]>();
  for (const result of results) {
    const group = suites.get(result.suite) ?? [];
    group.push(result);
    suites.set(result.suite, group);
  }

  for (const [suite, group] of suites) {
    lines.push(suite);
    for (const result of group) {
      const mark = MARKS[result.verdict];
      lines.push(`  ${paint(mark.color, mark.symbol)} ${result.name} ${paint('90', `(${result.durationMs}ms)`)}`);
      for (const diagnostic of result.diagnostics) {
        lines.push(
          result.verdict === 'pass'
            ? `    ${paint('90', `→ ${diagnostic}`)}`
            : `    ${paint(mark.color, `└─ ${diagnostic}`)}`
        );
      }
    }
    lines.push('');
  }

  const summary = summarize(results);
  const durationMs = options.durationMs ?? results.reduce((sum, result) => sum + result.durationMs, 0);

  lines.push('-'.repeat(70));
  lines.push('  Summary');
  lines.push('-'.repeat(70));
  lines.push(`  ${paint('32', `✓ ${summary.passed} passed`)}`);
  if (summary.failed > 0) {
    lines.push(`  ${paint('31', `✗ ${summary.failed} failed`)}`);
  }
  if (summary.errors > 0) {
    lines.push(`  ${paint('33', `! ${summary.errors} errors`)}`);
  }
  lines.push(`  ⏱  ${(durationMs / 1000).toFixed(2)}s`);
  lines.push('='.repeat(70));

  const notPassed = results.filter(result => result.verdict !== 'pass');
  if (notPassed.length > 0) {
    lines.push('');
    lines.push(paint('31', 'Did not pass:'));
    for (const result of notPassed) {
      lines.push(`  ${result.suite}/${result.name} (${result.verdict})`);
    }
  }

  return lines.join('\n');
}

export function printReport(results: readonly ScenarioResult[], options: ReportOptions = {}): void {
  console.log(formatReport(results, options));
}
