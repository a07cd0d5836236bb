/**
 * Remote command composition shared by both transports.
 */

/**
 * `export K="V" && ` for each entry, or '' when there is nothing to export.
 */
export function buildEnvExports(env: Record<string, string>): string {
  const entries = Object.entries(env);
  if (entries.length === 0) return '';
  return `${entries.map(([key, value]) => `export ${key}="${value}"`).join(' && ')} && `;
}

/**
 * Denylist entries may arrive comma or newline separated, repeated or not.
 */
export function mergeDenylists(...lists: ReadonlyArray<readonly string[]>): string[] {
  const merged: string[] = [];
  for (const list of lists) {
    for (const item of list) {
      for (const part of item.split(/[,\n]/)) {
        const entry = part.trim();
        if (entry && !merged.includes(entry)) merged.push(entry);
      }
    }
  }
  return merged;
}

export function buildDirectCommand(command: string, targetDir: string, env: Record<string, string>): string {
  return `${buildEnvExports(env)}cd "${targetDir}" && ${command}`;
}

/**
 * The workflow runner changes into the target directory itself.
 */
export function buildWorkflowCommand(command: string, env: Record<string, string>): string {
  return `${buildEnvExports(env)}${command}`;
}
