import type { HostCapabilities } from '../host/capabilities';
import type { Logger } from '../utils/logger';

type Version = readonly [number, number, number];

/**
 * True when `required` is newer than `current` by major or minor version
 */
export function isNewerMinorVersion(required: Version, current: Version): boolean {
  return required[0] > current[0] || (required[0] === current[0] && required[1] > current[1]);
}

/**
 * Run-level gate for rig binding. A plugin declaring a minimum host version
 * newer than the running host disables rig binding for the whole run; an
 * unknown minimum (or no plugin at all) does not.
 */
export function checkRigPluginCompatibility(host: HostCapabilities, logger: Logger): boolean {
  const plugin = host.probeRigPlugin();
  if (!plugin?.minHostVersion) {
    return true;
  }

  const info = host.describe();
  if (isNewerMinorVersion(plugin.minHostVersion, info.version)) {
    const [reqMajor, reqMinor] = plugin.minHostVersion;
    const [curMajor, curMinor] = info.version;
    logger.warn(`${plugin.name} reports minimum ${info.name} ${reqMajor}.${reqMinor}; current is ${curMajor}.${curMinor}`);
    logger.warn('Skipping rig binding; using conversion-only export for this run');
    return false;
  }
  return true;
}
