import type { ZodError } from 'zod';
import type { NodeId } from './filter/graph.js';

export class UnrenderableGraphError extends Error {
  override readonly name = 'UnrenderableGraphError';

  constructor(
    message: string,
    readonly nodeId?: NodeId,
  ) {
    super(message);
    // Restore prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class GeneratorConfigurationError extends Error {
  override readonly name = 'GeneratorConfigurationError';

  constructor(
    readonly entitySetName: string,
    message?: string,
  ) {
    super(message ?? `Entity set "${entitySetName}" has no filterable properties and no filter functions`);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class InvalidDocumentError extends Error {
  override readonly name = 'InvalidDocumentError';

  constructor(
    message: string,
    readonly issues: readonly string[] = [],
  ) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Wraps a failed zod parse, one `path: message` entry per issue. */
export function invalidDocument(message: string, error: ZodError): InvalidDocumentError {
  const issues = error.issues.map((issue) => {
    const path = issue.path.length > 0 ? issue.path.join('.') : '(root)';
    return `${path}: ${issue.message}`;
  });
  return new InvalidDocumentError(message, issues);
}
