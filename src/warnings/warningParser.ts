import type { ParsedWarning } from '../types/violations';
import { MalformedWarningError } from '../utils/errors';

export const NAMESPACE_WARNING_PREFIX = 'existing pods in namespace';

// existing pods in namespace "my-namespace" violate the new PodSecurity enforce level "restricted:latest"
const NAMESPACE_WARNING_PATTERN =
  /^existing pods in namespace "(?<namespace>[^"]+)" violate the new PodSecurity enforce level "(?<level>[^"]+)"$/;
const QUOTED_SEGMENT = /"[^"]*"/g;
const EXPECTED_QUOTED_SEGMENTS = 2;

const POD_NAME_SEPARATOR = ': ';
const VIOLATION_SEPARATOR = ', ';

function parseNamespaceWarning(text: string): ParsedWarning {
  const quotedCount = text.match(QUOTED_SEGMENT)?.length ?? 0;
  if (quotedCount !== EXPECTED_QUOTED_SEGMENTS) {
    throw new MalformedWarningError(
      `Namespace warning has ${quotedCount} quoted segment(s), expected ${EXPECTED_QUOTED_SEGMENTS}`,
      text
    );
  }

  const groups = NAMESPACE_WARNING_PATTERN.exec(text)?.groups;
  const namespace = groups?.['namespace'];
  const level = groups?.['level'];
  if (!namespace || !level) {
    throw new MalformedWarningError('Namespace warning does not match the expected wording', text);
  }

  return { kind: 'namespace', namespace, level };
}

// {pod name}: {policy violation A}, {policy violation B}, ...
function parsePodWarning(text: string): ParsedWarning {
  const separatorAt = text.indexOf(POD_NAME_SEPARATOR);
  if (separatorAt === -1) {
    throw new MalformedWarningError(`Pod warning has no "${POD_NAME_SEPARATOR}" separator`, text);
  }

  const name = text.slice(0, separatorAt).trim();
  const violationList = text.slice(separatorAt + POD_NAME_SEPARATOR.length);
  if (!name) {
    throw new MalformedWarningError('Pod warning has an empty pod name', text);
  }
  if (!violationList) {
    throw new MalformedWarningError('Pod warning lists no violations', text);
  }

  return { kind: 'pod', name, violations: violationList.split(VIOLATION_SEPARATOR) };
}

// Classify a PodSecurity warning. Anything that is not a namespace-level
// header is read as a pod-level detail line.
export function parseWarning(text: string): ParsedWarning {
  if (text.startsWith(NAMESPACE_WARNING_PREFIX)) {
    return parseNamespaceWarning(text);
  }
  return parsePodWarning(text);
}
