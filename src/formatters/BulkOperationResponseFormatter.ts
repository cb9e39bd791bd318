/**
 * BulkOperationResponseFormatter - Renders bulk operation results as markdown text
 *
 * Both counts are always shown, and failures are never dropped silently: the
 * first few error lines are listed and the remainder is counted.
 */

import type { WorkPackage, WorkPackageUpdate } from '../types/openproject';
import type {
  BulkOperationResult,
  FilteredUpdateOutcome,
  FilteredUpdatePreview,
} from '../tools/work-packages/bulk';

export interface BulkFormatOptions<T> {
  /** Headline noun phrase, e.g. "Bulk Update" */
  title: string;
  /** One line per successful item */
  describe: (value: T) => string;
  /** Extra lines rendered under the headline */
  context?: string[];
  /** Closing line when at least one item succeeded */
  footer?: string;
}

const MAX_LISTED_ERRORS = 5;
const MAX_LISTED_SUCCESSES = 5;
const MAX_PREVIEW_ITEMS = 10;

export function describeWorkPackage(workPackage: WorkPackage): string {
  return `#${workPackage.id}: ${workPackage.subject}`;
}

function formatUpdateValue(value: WorkPackageUpdate[keyof WorkPackageUpdate]): string {
  return value === null ? '(cleared)' : String(value);
}

/**
 * Formats bulk operation results into a user-friendly text response
 */
export class BulkOperationResponseFormatter {
  formatResult<T>(result: BulkOperationResult<T>, options: BulkFormatOptions<T>): string {
    let text = this.formatHeadline(result, options.title);

    if (options.context && options.context.length > 0) {
      text += options.context.map((line) => `${line}\n`).join('');
    }

    text += this.formatSummary(result);
    text += this.formatErrors(result);
    text += this.formatSuccesses(result, options.describe);

    if (options.footer && result.succeeded > 0) {
      text += `\n${options.footer}\n`;
    }

    return text;
  }

  /**
   * Format either branch of a filtered bulk update
   */
  formatFilteredOutcome(outcome: FilteredUpdateOutcome): string {
    if (outcome.dryRun) {
      return this.formatPreview(outcome);
    }

    if (outcome.result.total === 0) {
      return '✅ No work packages match the filter criteria.';
    }

    return this.formatResult(outcome.result, {
      title: 'Bulk Update',
      describe: describeWorkPackage,
      context: [`**Filter Matched**: ${outcome.matched} total`],
    });
  }

  formatPreview(preview: FilteredUpdatePreview): string {
    if (preview.workPackages.length === 0) {
      return '✅ No work packages match the filter criteria.';
    }

    let text = '🔍 **DRY RUN - Preview of Bulk Update**\n\n';
    text += `**Filter Matched**: ${preview.matched} work package(s)\n`;
    text += `**Will Update**: ${preview.workPackages.length} work package(s)\n\n`;

    text += '**Updates to Apply**:\n';
    for (const [field, value] of Object.entries(preview.update)) {
      if (value !== undefined) {
        text += `- ${field}: ${formatUpdateValue(value)}\n`;
      }
    }

    text += `\n**Preview of Affected Work Packages** (first ${MAX_PREVIEW_ITEMS}):\n`;
    for (const workPackage of preview.workPackages.slice(0, MAX_PREVIEW_ITEMS)) {
      text += `- ${describeWorkPackage(workPackage)}\n`;
    }
    if (preview.workPackages.length > MAX_PREVIEW_ITEMS) {
      text += `... and ${preview.workPackages.length - MAX_PREVIEW_ITEMS} more\n`;
    }

    text += '\n⚠️ **This is a DRY RUN** - No changes were made.\n';
    text += 'To execute, call again with: dryRun=false\n';
    return text;
  }

  private formatHeadline<T>(result: BulkOperationResult<T>, title: string): string {
    if (result.failed === 0) {
      return `✅ **${title} Complete!**\n\n`;
    }
    if (result.succeeded === 0) {
      return `❌ **${title} Failed**\n\n`;
    }
    return `⚠️ **${title} Partially Complete**\n\n`;
  }

  private formatSummary<T>(result: BulkOperationResult<T>): string {
    let summary = `**Total**: ${result.total} | **Success**: ${result.succeeded} | **Failed**: ${result.failed}\n`;
    summary += `**Success Rate**: ${result.successRate().toFixed(1)}%\n`;
    summary += `**Duration**: ${result.duration.toFixed(2)}s\n`;
    if (result.totalRetries > 0) {
      summary += `**Retries**: ${result.totalRetries} across ${result.itemsWithRetries} item(s)\n`;
    }
    return summary;
  }

  private formatErrors<T>(result: BulkOperationResult<T>): string {
    if (result.errors.length === 0) {
      return '';
    }

    let errors = `\n**Errors** (first ${MAX_LISTED_ERRORS}):\n`;
    result.errors.slice(0, MAX_LISTED_ERRORS).forEach((error, index) => {
      errors += `${index + 1}. ${error}\n`;
    });
    if (result.errors.length > MAX_LISTED_ERRORS) {
      errors += `... and ${result.errors.length - MAX_LISTED_ERRORS} more\n`;
    }
    return errors;
  }

  private formatSuccesses<T>(result: BulkOperationResult<T>, describe: (value: T) => string): string {
    if (result.successes.length === 0) {
      return '';
    }

    let successes = `\n**Succeeded** (first ${MAX_LISTED_SUCCESSES}):\n`;
    for (const value of result.successes.slice(0, MAX_LISTED_SUCCESSES)) {
      successes += `- ${describe(value)}\n`;
    }
    if (result.successes.length > MAX_LISTED_SUCCESSES) {
      successes += `... and ${result.successes.length - MAX_LISTED_SUCCESSES} more\n`;
    }
    return successes;
  }
}
