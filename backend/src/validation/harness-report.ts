/**
 * Harness Report - parse `node --test --test-reporter=tap` output
 *
 * The structured report is the only input to acceptance checks. Output
 * without the runner's summary block yields no report: the harness did not
 * run to completion.
 *
 * A test file that declares no tests is reported by the runner as one
 * passing top-level test named after the file. That entry asserts nothing,
 * so it is taken out of the counts.
 */

import type { HarnessReport } from '@forgeloop/shared-types';

const SUMMARY_LINE = /^#\s+(tests|pass|fail|cancelled)\s+(\d+)\s*$/;
const NOT_OK_LINE = /^\s*not ok \d+ - (.+?)(?:\s+#\s.*)?$/;
const TOP_LEVEL_OK_LINE = /^ok \d+ - (.+?)(?:\s+#\s.*)?$/;

export interface TapReportOptions {
  /** Test file the harness ran, as passed to the runner */
  harnessFile?: string;
}

function namesHarnessFile(name: string, harnessFile: string): boolean {
  return name === harnessFile || name.endsWith(`/${harnessFile}`) || name.endsWith(`\\${harnessFile}`);
}

export function parseTapReport(output: string, options: TapReportOptions = {}): HarnessReport | undefined {
  const counts = new Map<string, number>();
  const failures: string[] = [];
  let emptyFiles = 0;

  for (const line of output.split(/\r?\n/)) {
    const passed = line.match(TOP_LEVEL_OK_LINE)?.[1]?.trim();
    if (passed && options.harnessFile && namesHarnessFile(passed, options.harnessFile)) {
      emptyFiles++;
      continue;
    }

    const summary = line.match(SUMMARY_LINE);
    if (summary) {
      counts.set(summary[1] ?? '', Number(summary[2]));
      continue;
    }

    const failure = line.match(NOT_OK_LINE);
    const name = failure?.[1]?.trim();
    if (name && !failures.includes(name)) {
      failures.push(name);
    }
  }

  const total = counts.get('tests');
  if (total === undefined) {
    return undefined;
  }

  return {
    total: Math.max(0, total - emptyFiles),
    passed: Math.max(0, (counts.get('pass') ?? 0) - emptyFiles),
    // cancelled tests never ran to an assertion; they count against the candidate
    failed: (counts.get('fail') ?? 0) + (counts.get('cancelled') ?? 0),
    failures,
  };
}
