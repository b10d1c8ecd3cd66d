import { getLogger } from '@fluidware-it/saddlebag';
import type { NamespaceViolation, SkippedWarning, WarningHandler } from '../types/violations';
import { parseWarning } from './warningParser';
import { ViolationTreeBuilder } from './violationTree';

const logger = getLogger();

// Logs every warning, the way kubectl surfaces them to the user.
export class LoggingWarningHandler implements WarningHandler {
  handle(code: number, agent: string, text: string): void {
    if (!text) return;
    logger.warn(`Warning: ${text} (code ${code}, agent ${agent})`);
  }
}

// Collects PodSecurity violations out of the API server warnings and passes
// every warning on to the wrapped handler, if any.
export class PodSecurityWarningCollector implements WarningHandler {
  private readonly tree = new ViolationTreeBuilder();
  private readonly skippedWarnings: SkippedWarning[] = [];

  constructor(private readonly inner?: WarningHandler) {}

  get violations(): readonly NamespaceViolation[] {
    return this.tree.violations;
  }

  get skipped(): readonly SkippedWarning[] {
    return this.skippedWarnings;
  }

  handle(code: number, agent: string, text: string): void {
    if (text) {
      this.record(text);
    }
    this.inner?.handle(code, agent, text);
  }

  private record(text: string): void {
    try {
      this.tree.add(parseWarning(text), text);
    } catch (error: unknown) {
      const reason = error instanceof Error ? `${error.name}: ${error.message}` : String(error);
      logger.warn(`Skipping warning "${text}": ${reason}`);
      this.skippedWarnings.push({ text, reason });
    }
  }
}
