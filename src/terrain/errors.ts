export type TerrainErrorKind = 'InvalidInput' | 'TopologyInconsistency' | 'DependencyFailure';

export class TerrainError extends Error {
  readonly kind: TerrainErrorKind;

  constructor(kind: TerrainErrorKind, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TerrainError';
    this.kind = kind;
  }
}

export const invalidInput = (message: string): TerrainError => new TerrainError('InvalidInput', message);

export const topologyInconsistency = (message: string): TerrainError =>
  new TerrainError('TopologyInconsistency', message);

export const dependencyFailure = (message: string, cause?: unknown): TerrainError =>
  new TerrainError('DependencyFailure', message, { cause });

export function isTerrainError(value: unknown, kind?: TerrainErrorKind): value is TerrainError {
  return value instanceof TerrainError && (kind === undefined || value.kind === kind);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
