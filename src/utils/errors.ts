import { ApiException } from '@kubernetes/client-node';

// Warning text that matches neither the namespace nor the pod message shape.
export class MalformedWarningError extends Error {
  constructor(
    message: string,
    public readonly text: string
  ) {
    super(message);
    this.name = 'MalformedWarningError';
  }
}

// A pod-level warning arrived before any namespace-level warning opened a context for it.
export class OutOfOrderWarningError extends Error {
  constructor(public readonly text: string) {
    super(`Pod warning received before any namespace warning: "${text}"`);
    this.name = 'OutOfOrderWarningError';
  }
}

function messageFromBody(body: unknown): string | undefined {
  if (typeof body === 'string') {
    try {
      const parsed: unknown = JSON.parse(body);
      return messageFromBody(parsed) ?? body;
    } catch {
      return body || undefined;
    }
  }
  if (typeof body === 'object' && body !== null && 'message' in body && typeof body.message === 'string') {
    return body.message;
  }
  return undefined;
}

// Extract a human-readable message from a K8s API error.
// The API server puts its explanation in a Status object carried by the response body.
export function errorMessage(error: unknown): string {
  if (error instanceof ApiException) {
    const fromBody = messageFromBody(error.body);
    return fromBody ? `${fromBody} (HTTP ${error.code})` : `HTTP ${error.code}`;
  }
  if (error instanceof Error) return error.message;
  return String(error);
}

export function isConflict(error: unknown): boolean {
  return error instanceof ApiException && error.code === 409;
}
