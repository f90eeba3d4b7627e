import path from 'path';

/** Resolves the SQLite file location; relative paths are taken from the project root. */
export function getDatabasePath(configuredPath?: string): string {
  if (configuredPath === ':memory:') {
    return configuredPath;
  }

  const projectRoot = path.join(path.dirname(new URL(import.meta.url).pathname), '../..');
  // Compiled output lives one level deeper (dist/src/database)
  const root = path.basename(projectRoot) === 'dist' ? path.dirname(projectRoot) : projectRoot;

  if (!configuredPath) {
    return path.join(root, 'database/rota.db');
  }
  return path.isAbsolute(configuredPath) ? configuredPath : path.join(root, configuredPath);
}
