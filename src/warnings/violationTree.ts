import type { NamespaceViolation, ParsedWarning } from '../types/violations';
import { OutOfOrderWarningError } from '../utils/errors';

// Accumulates parsed warnings into namespace -> pod violations.
//
// The API server gives no key tying a pod warning to its namespace warning;
// pod warnings belong to the namespace warning received last. That namespace
// is held in `current`, which only a new namespace warning replaces.
export class ViolationTreeBuilder {
  private readonly roots: NamespaceViolation[] = [];
  private current: NamespaceViolation | undefined;

  get violations(): readonly NamespaceViolation[] {
    return this.roots;
  }

  get currentNamespace(): string | undefined {
    return this.current?.namespace;
  }

  openNamespace(namespace: string, level: string): NamespaceViolation {
    const node: NamespaceViolation = { namespace, level, podViolations: [] };
    this.roots.push(node);
    this.current = node;
    return node;
  }

  // `text` is only carried into the error when there is no current namespace
  appendPod(name: string, violations: string[], text = `${name}: ${violations.join(', ')}`): void {
    if (!this.current) {
      throw new OutOfOrderWarningError(text);
    }
    this.current.podViolations.push({ name, violations });
  }

  add(parsed: ParsedWarning, text?: string): void {
    if (parsed.kind === 'namespace') {
      this.openNamespace(parsed.namespace, parsed.level);
    } else {
      this.appendPod(parsed.name, parsed.violations, text);
    }
  }
}
