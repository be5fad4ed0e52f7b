/**
 * CLI Output Layer
 *
 * Provides consistent output formatting for CLI commands in both
 * human-readable and JSON modes.
 */

import {
  ClusterUpdateError,
  ConfigValidationError,
  isClusterError,
  type ClusterError,
  type ErrorCode,
} from '../core/errors.js';
import type { ClusterSummary, DeleteResult, FleetResult } from '../core/types.js';
import type { JsonObject, JsonValue } from '../lib/json.js';
import type { LogSink, OutputMode } from '../lib/logger.js';
import type { ChangeVerdict } from '../update/types.js';
import type { ValidationFinding, ValidationReport } from '../validation/types.js';

// =============================================================================
// Output Types
// =============================================================================

/**
 * Standard output format for --json mode
 */
export interface CommandResult {
  success: boolean;
  command: string;
  cluster?: ClusterSummary;
  clusters?: ClusterSummary[];
  findings?: ValidationFinding[];
  changeSet?: ChangeSetRow[];
  configuration?: JsonObject;
  configVersion?: string;
  fleet?: FleetResult;
  deletion?: DeleteResult;
  error?: ErrorOutput;
}

/**
 * One row of a change-set table
 */
export interface ChangeSetRow {
  parameter: string;
  currentValue: JsonValue | null;
  requestedValue: JsonValue | null;
  updatePolicy: string;
  result: string;
  reason: string;
  action: string | null;
}

/**
 * Error output format for JSON mode
 */
export interface ErrorOutput {
  code: ErrorCode | string;
  message: string;
  suggestion?: string;
}

const consoleSink: LogSink = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

const LEVEL_SYMBOLS: Record<ValidationFinding['level'], string> = {
  ERROR: '✗',
  WARNING: '⚠',
  INFO: 'ℹ',
};

/**
 * Display form of a configuration value.
 */
export function formatValue(value: JsonValue | null): string {
  if (value === null) {
    return '-';
  }
  if (typeof value === 'string') {
    return value;
  }
  return JSON.stringify(value);
}

/**
 * Change-set row of a verdict.
 */
export function toChangeSetRow(verdict: ChangeVerdict): ChangeSetRow {
  return {
    parameter: verdict.parameter,
    currentValue: verdict.oldValue,
    requestedValue: verdict.newValue,
    updatePolicy: verdict.updatePolicy,
    result: verdict.result,
    reason: verdict.failReason,
    action: verdict.actionNeeded,
  };
}

// =============================================================================
// OutputFormatter Class
// =============================================================================

/**
 * CLI-specific output formatter.
 *
 * Provides high-level methods for formatting command output in both
 * human-readable and JSON modes. In JSON mode, output is collected
 * and emitted as a single JSON object at flush.
 */
export class OutputFormatter {
  private readonly mode: OutputMode;
  private readonly result: CommandResult;
  private indentLevel: number = 0;
  private readonly sink: LogSink;

  constructor(command: string, options: { json?: boolean; sink?: LogSink } = {}) {
    this.mode = options.json ? 'json' : 'human';
    this.sink = options.sink ?? consoleSink;
    this.result = {
      success: true,
      command,
    };
  }

  // ===========================================================================
  // Indentation
  // ===========================================================================

  /**
   * Increase indent level.
   */
  indent(): void {
    this.indentLevel++;
  }

  /**
   * Decrease indent level.
   */
  dedent(): void {
    if (this.indentLevel > 0) {
      this.indentLevel--;
    }
  }

  private getIndent(): string {
    return '  '.repeat(this.indentLevel);
  }

  private out(text: string): void {
    if (this.mode === 'human') {
      this.sink.out(`${this.getIndent()}${text}`);
    }
  }

  private err(text: string): void {
    if (this.mode === 'human') {
      this.sink.err(`${this.getIndent()}${text}`);
    }
  }

  // ===========================================================================
  // Basic Output Methods
  // ===========================================================================

  /**
   * Print a success message.
   */
  success(message: string): void {
    this.out(`✓ ${message}`);
  }

  /**
   * Print an error message.
   */
  error(message: string, error?: ClusterError): void {
    this.result.success = false;
    this.err(`✗ ${message}`);
    if (error?.suggestion) {
      this.err(`  Fix: ${error.suggestion}`);
    }

    this.result.error = {
      code: error?.code ?? 'UNKNOWN',
      message,
      suggestion: error?.suggestion,
    };
  }

  /**
   * Print an info message.
   */
  info(message: string): void {
    this.out(message);
  }

  /**
   * Print a warning message.
   */
  warning(message: string): void {
    this.err(`⚠ ${message}`);
  }

  // ===========================================================================
  // Table Output
  // ===========================================================================

  /**
   * Print a table of data.
   *
   * @param headers - Column headers
   * @param rows - Row data
   */
  table(headers: string[], rows: string[][]): void {
    const widths = headers.map((h, i) => {
      const maxRowWidth = Math.max(0, ...rows.map((r) => (r[i] ?? '').length));
      return Math.max(h.length, maxRowWidth);
    });

    this.out(headers.map((h, i) => h.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
    for (const row of rows) {
      this.out(row.map((cell, i) => cell.padEnd(widths[i] ?? 0)).join('  ').trimEnd());
    }
  }

  // ===========================================================================
  // Validation Output
  // ===========================================================================

  /**
   * Print validation findings, one per line.
   */
  findings(findings: ValidationFinding[]): void {
    for (const finding of findings) {
      const where = finding.path ? `${finding.path}: ` : '';
      const line = `${LEVEL_SYMBOLS[finding.level]} [${finding.validator}] ${where}${finding.message}`;
      if (finding.level === 'INFO') {
        this.out(line);
      } else {
        this.err(line);
      }
    }
    this.result.findings = findings;
  }

  /**
   * Print the outcome of a validation pass.
   */
  validationReport(report: ValidationReport): void {
    this.findings(report.findings);
    if (report.failed) {
      this.result.success = false;
      this.result.error = {
        code: 'CONFIG_VALIDATION_FAILED',
        message: `Configuration has findings at or above ${report.failureLevel}`,
      };
      this.err(`✗ Configuration invalid`);
    } else {
      this.success('Configuration valid');
    }
  }

  // ===========================================================================
  // Update Output
  // ===========================================================================

  /**
   * Print a change-set table.
   */
  changeSet(verdicts: ChangeVerdict[]): void {
    const rows = verdicts.map(toChangeSetRow);
    if (rows.length > 0) {
      this.table(
        ['PARAMETER', 'CURRENT', 'REQUESTED', 'POLICY', 'RESULT', 'REASON', 'ACTION'],
        rows.map((row) => [
          row.parameter,
          formatValue(row.currentValue),
          formatValue(row.requestedValue),
          row.updatePolicy,
          row.result,
          row.reason,
          row.action ?? '-',
        ])
      );
    }
    this.result.changeSet = rows;
  }

  // ===========================================================================
  // Cluster Output
  // ===========================================================================

  /**
   * Print the status of one cluster.
   */
  clusterStatus(summary: ClusterSummary): void {
    this.info(`Cluster: ${summary.name}`);
    this.indent();
    this.info(`State: ${summary.state}`);
    if (summary.stackStatus !== null) {
      this.info(`Stack status: ${summary.stackStatus}`);
      this.info(`Compute fleet: ${summary.fleetStatus ?? '-'}`);
      this.info(`Scheduler: ${summary.scheduler ?? '-'}`);
      this.info(`Config version: ${summary.configVersion ?? '-'}`);
      this.info(`Version: ${summary.version ?? '-'}`);
    }
    this.dedent();
    this.result.cluster = summary;
  }

  /**
   * Print a table of clusters.
   */
  clusterList(summaries: ClusterSummary[]): void {
    if (summaries.length === 0) {
      this.info('No clusters found.');
    } else {
      this.table(
        ['NAME', 'STATE', 'STACK STATUS', 'FLEET', 'VERSION'],
        summaries.map((s) => [s.name, s.state, s.stackStatus ?? '-', s.fleetStatus ?? '-', s.version ?? '-'])
      );
    }
    this.result.clusters = summaries;
  }

  /**
   * Print the outcome of a start or stop.
   */
  fleet(result: FleetResult): void {
    if (result.changed) {
      this.success(`Compute fleet of ${result.name} moved from ${result.previous} to ${result.current}`);
    } else {
      this.info(`Compute fleet of ${result.name} is already ${result.current}`);
    }
    this.result.fleet = result;
  }

  /**
   * Print the outcome of a delete.
   */
  deletion(result: DeleteResult): void {
    if (result.deleted) {
      this.success(`Cluster ${result.name} deleted`);
      if (result.keptLogs) {
        this.info('Log groups were retained');
      }
    } else {
      this.info(`Cluster ${result.name} does not exist; nothing to delete`);
    }
    this.result.deletion = result;
  }

  /**
   * Print a resolved configuration.
   */
  configuration(document: JsonObject, yamlText: string): void {
    for (const line of yamlText.trimEnd().split('\n')) {
      this.out(line);
    }
    this.result.configuration = document;
  }

  // ===========================================================================
  // Errors
  // ===========================================================================

  /**
   * Report any error, including the findings or blocking changes it carries.
   */
  failure(error: unknown): void {
    if (error instanceof ConfigValidationError) {
      this.findings(error.findings);
    } else if (error instanceof ClusterUpdateError) {
      this.changeSet(error.verdicts.filter((verdict) => verdict.display || verdict.result !== 'SUCCEEDED'));
    }

    if (isClusterError(error)) {
      this.error(error.message, error);
    } else if (error instanceof Error) {
      this.error(error.message);
    } else {
      this.error(String(error));
    }
  }

  // ===========================================================================
  // JSON Output
  // ===========================================================================

  /**
   * Record the config version produced by the command.
   */
  setConfigVersion(configVersion: string): void {
    this.result.configVersion = configVersion;
  }

  /**
   * Get the command result object.
   */
  getResult(): CommandResult {
    return this.result;
  }

  /**
   * Flush output.
   *
   * In JSON mode, prints the collected JSON.
   * In human mode, does nothing (output was printed inline).
   */
  flush(): void {
    if (this.mode === 'json') {
      this.sink.out(JSON.stringify(this.result, null, 2));
    }
  }

  /**
   * Get the exit code based on success status.
   */
  getExitCode(): number {
    return this.result.success ? 0 : 1;
  }
}

/**
 * Create an OutputFormatter from CLI options.
 */
export function createOutput(command: string, options: { json?: boolean }): OutputFormatter {
  return new OutputFormatter(command, options);
}
