import * as path from 'path';

export class PathSecurityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'PathSecurityError';
  }
}

export interface PathValidator {
  validate: (targetPath: string) => string;
  isSafe: (targetPath: string) => boolean;
  allowPath: (externalPath: string) => void;
  getAllowedPaths: () => string[];
}

function isInside(candidate: string, root: string): boolean {
  const relative = path.relative(root, candidate);
  return relative === '' || (!relative.startsWith('..') && !path.isAbsolute(relative));
}

export function validateAndResolvePath(
  targetPath: string,
  workingDirectory: string,
  allowedExternalPaths: string[] = []
): string {
  const resolvedPath = path.resolve(workingDirectory, targetPath);

  if (isInside(resolvedPath, path.resolve(workingDirectory))) {
    return resolvedPath;
  }

  for (const allowedPath of allowedExternalPaths) {
    if (isInside(resolvedPath, allowedPath)) {
      return resolvedPath;
    }
  }

  throw new PathSecurityError(
    `Access denied: "${targetPath}" resolves to "${resolvedPath}", outside the workspace "${workingDirectory}"`
  );
}

export function createPathValidator(workingDirectory: string): PathValidator {
  const allowedExternalPaths: Set<string> = new Set();

  return {
    validate: (targetPath: string): string => {
      return validateAndResolvePath(targetPath, workingDirectory, Array.from(allowedExternalPaths));
    },

    isSafe: (targetPath: string): boolean => {
      try {
        validateAndResolvePath(targetPath, workingDirectory, Array.from(allowedExternalPaths));
        return true;
      } catch {
        return false;
      }
    },

    allowPath: (externalPath: string): void => {
      allowedExternalPaths.add(path.resolve(externalPath));
    },

    getAllowedPaths: (): string[] => {
      return Array.from(allowedExternalPaths);
    }
  };
}
