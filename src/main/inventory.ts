import type { SessionState } from '@shared/types/session.types';
import { FirmwareCatalog } from './firmware/FirmwareCatalog';
import { formatPortLabel } from './serial/PortRegistry';

/** Report lines for `list`. Resolves each version through the catalog; the session selection is not touched. */
export async function formatInventory(state: SessionState, catalog: FirmwareCatalog): Promise<string[]> {
  const lines = ['Serial ports:'];
  if (state.ports.length === 0) lines.push('  (none)');
  for (const port of state.ports) lines.push(`  ${formatPortLabel(port)}`);

  lines.push('Firmware versions:');
  if (state.versions.length === 0) lines.push('  (none)');
  for (const version of state.versions) {
    const missing = FirmwareCatalog.missingRoles(await catalog.resolveFiles(version));
    const note = missing.length === 0 ? 'ready' : `missing ${missing.join(', ')}`;
    lines.push(`  ${version.name} (${note})`);
  }
  return lines;
}
