/**
 * Prompts for tool generation and correction
 */

import type { AttemptFeedback, ToolSpecification } from '@forgeloop/shared-types';
import { sandboxFileNames } from '../validation/sandbox';
import { summarizeFailureOutput } from '../validation/failure-summary';

export const BUILD_SYSTEM_PROMPT = `You are an expert JavaScript developer writing small, dependency-free command-line tools for Node.js 20.

The tool module MUST:
- Be a single ES module (.mjs) using only Node.js built-in modules imported with the "node:" prefix
- Export its core functions so they can be tested directly
- Handle edge cases (empty input, missing files, invalid arguments) without unhandled exceptions
- Not contain hardcoded file paths, credentials or network calls that tests depend on

The test file MUST:
- Use node:test (import { test } from 'node:test') and node:assert/strict
- Import the tool module with a relative path
- Contain at least 3 meaningful test cases that pass without network access

Respond with a JSON object only.`;

const RESPONSE_SHAPE = `{
  "code": "complete source of the tool module",
  "tests": "complete node:test test file",
  "readme": "markdown README: description, usage, features"
}`;

function specBlock(spec: ToolSpecification): string {
  const files = sandboxFileNames(spec.name);
  const criteria = spec.acceptanceCriteria.map((criterion, i) => `${i + 1}. ${criterion}`).join('\n');
  return [
    `TOOL NAME: ${spec.name}`,
    spec.displayName ? `DISPLAY NAME: ${spec.displayName}` : '',
    `DESCRIPTION: ${spec.description}`,
    `MODULE FILE: ${files.source}`,
    `TEST FILE: ${files.tests} (imports './${files.source}')`,
    'ACCEPTANCE CRITERIA (each must be asserted by at least one test):',
    criteria,
  ]
    .filter(Boolean)
    .join('\n');
}

export function buildGenerationPrompt(spec: ToolSpecification): string {
  return `Build a complete tool from this specification:

${specBlock(spec)}

Return ONLY a JSON object with exactly these keys:
${RESPONSE_SHAPE}`;
}

export function buildCorrectionPrompt(
  spec: ToolSpecification,
  feedback: AttemptFeedback,
  maxFeedbackChars: number,
): string {
  const sections = [
    'The previous attempt at this tool was rejected by its test harness. Fix it so every test passes.',
    '',
    specBlock(spec),
  ];

  if (feedback.previous) {
    sections.push(
      '',
      'CURRENT TOOL CODE:',
      '```js',
      feedback.previous.source,
      '```',
      '',
      'CURRENT TEST CODE:',
      '```js',
      feedback.previous.tests,
      '```',
    );
  }

  sections.push(
    '',
    'HARNESS OUTPUT:',
    '```',
    summarizeFailureOutput(feedback.diagnostics, maxFeedbackChars),
    '```',
    '',
    'Return ONLY a JSON object with the same structure as before:',
    RESPONSE_SHAPE,
  );

  return sections.join('\n');
}
