/**
 * Erreurs des collaborateurs externes (décodage, stockage).
 * Le store les attrape toutes et les convertit en message de statut.
 */

export class DecodeError extends Error {
  readonly path: string;

  constructor(path: string, cause?: unknown) {
    super(`Cannot decode image: ${path}`, cause === undefined ? undefined : { cause });
    this.name = 'DecodeError';
    this.path = path;
  }
}

export class StorageError extends Error {
  readonly path: string;

  constructor(op: 'read' | 'write' | 'remove' | 'list', path: string, cause?: unknown) {
    super(`Storage ${op} failed: ${path}`, cause === undefined ? undefined : { cause });
    this.name = 'StorageError';
    this.path = path;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
