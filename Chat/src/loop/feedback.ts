/**
 * Messages built from execution results: what the user sees, the fix
 * request after a failure, and the follow-up that asks the model to
 * comment on the final results.
 */

import { truncateOutput, type ExecutionResult, type TruncateConfig } from '@pyloop/code-runner';

export interface BlockReport {
  /** Code that produced `result`; after fixes, the last attempt */
  code: string;
  result: ExecutionResult;
  fixAttempts: number;
}

export interface FeedbackOptions {
  truncation: TruncateConfig;
  /** Set when the code processes an uploaded file */
  fileName?: string;
}

function subject(options: FeedbackOptions): string {
  return options.fileName ? `The code to process the uploaded file '${options.fileName}'` : 'The code';
}

function seconds(ms: number): string {
  return `${Math.round(ms / 100) / 10}`;
}

/**
 * The error text of a failed run. Falls back to a description when stderr is empty.
 */
export function errorText(result: ExecutionResult): string {
  if (result.stderr.trim()) return result.stderr;
  if (result.signal) return `Process was terminated by ${result.signal} and wrote no error output.`;
  return `Code execution failed with exit code ${result.exitCode} and empty stderr.`;
}

/**
 * Output block shown to the user after each run
 */
export function formatResultForDisplay(result: ExecutionResult, timeoutMs: number): string {
  switch (result.outcome) {
    case 'succeeded':
      return `Code executed successfully in ${seconds(result.durationMs)}s. Output:\n${result.stdout || '(no output)'}`;
    case 'timed_out':
      return `Code execution timed out after ${seconds(timeoutMs)} seconds and was stopped.${
        result.stdout ? `\nOutput before the timeout:\n${result.stdout}` : ''
      }`;
    case 'failed':
      return `Code execution failed (exit code ${result.exitCode ?? result.signal}):\n${errorText(result)}`;
  }
}

export function buildFixRequest(result: ExecutionResult, options: FeedbackOptions): string {
  const error = truncateOutput(errorText(result), options.truncation).text;
  return (
    `${subject(options)} failed with the following error:\n\n${error}\n\n` +
    'Please fix the code and provide a corrected version in a single ```python block. ' +
    'Make sure your solution handles the error case.'
  );
}

function describeResult(report: BlockReport, options: FeedbackOptions): string {
  const { result } = report;
  switch (result.outcome) {
    case 'succeeded': {
      const output = truncateOutput(result.stdout, options.truncation).text;
      return `has been executed successfully. Here is the output:\n${output || '(no output)'}`;
    }
    case 'timed_out':
      return 'timed out and was stopped before it finished.';
    case 'failed': {
      const error = truncateOutput(errorText(result), options.truncation).text;
      const attempts = report.fixAttempts > 0 ? ` after ${report.fixAttempts} fix attempt(s)` : '';
      return `still failed to execute properly${attempts}. Final error:\n${error}`;
    }
  }
}

function closingQuestion(reports: readonly BlockReport[]): string {
  if (reports.some((r) => r.result.outcome === 'failed')) {
    return 'Could you explain what might be causing this persistent issue?';
  }
  if (reports.some((r) => r.result.outcome === 'timed_out')) {
    return (
      'This usually happens when the code has an infinite loop or takes too long to execute. ' +
      'Could you explain what might have caused the timeout and how to avoid it?'
    );
  }
  return "Is there anything you'd like to explain about these results?";
}

/**
 * The synthetic message reporting every block's final result to the model
 */
export function buildFollowUp(reports: readonly BlockReport[], options: FeedbackOptions): string {
  if (reports.length === 1) {
    return `${subject(options)} ${describeResult(reports[0], options)}\n\n${closingQuestion(reports)}`;
  }

  const sections = reports.map(
    (report, index) => `Block ${index + 1}: ${subject(options)} ${describeResult(report, options)}`,
  );
  return (
    `I ran the ${reports.length} Python code blocks from your reply in order.\n\n` +
    `${sections.join('\n\n')}\n\n${closingQuestion(reports)}`
  );
}
