import { execSimple, type Exec } from './exec.js';
import { createLogger } from '../log/logger.js';
import type { DiskInfo } from '../types.js';

const log = createLogger('disks');

export const LSBLK_ARGS = ['-b', '-J', '-o', 'NAME,SIZE,TYPE,MOUNTPOINTS,RM'] as const;

const SUPPORTED_PREFIXES = ['sd', 'nvme', 'hd', 'vd'];

// Mount points that only exist on the booted installer medium.
const LIVE_MOUNT_POINTS = new Set(['/', '/iso', '/nix/.ro-store', '/nix/store']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toNumber(value: unknown): number {
  if (typeof value === 'number') return value;
  if (typeof value === 'string') return parseInt(value, 10) || 0;
  return 0;
}

function toBool(value: unknown): boolean {
  return value === true || value === 1 || value === '1';
}

function collectMountPoints(device: Record<string, unknown>): string[] {
  const mounts: string[] = [];
  const own = device.mountpoints;
  if (Array.isArray(own)) {
    for (const m of own) {
      if (typeof m === 'string' && m !== '' && m !== 'null') mounts.push(m);
    }
  }
  if (Array.isArray(device.children)) {
    for (const child of device.children) {
      if (isRecord(child)) mounts.push(...collectMountPoints(child));
    }
  }
  return mounts;
}

/** Turns `lsblk -b -J` output into installable whole disks. */
export function parseLsblkOutput(json: string): DiskInfo[] {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed) || !Array.isArray(parsed.blockdevices)) {
    log.warn('No block devices found in lsblk output');
    return [];
  }

  const disks: DiskInfo[] = [];
  for (const device of parsed.blockdevices) {
    if (!isRecord(device) || typeof device.name !== 'string') continue;
    const name = device.name;
    if (device.type !== 'disk') {
      log.debug(`Skipping non-disk device: ${name}`);
      continue;
    }
    if (!SUPPORTED_PREFIXES.some((prefix) => name.startsWith(prefix))) {
      log.debug(`Skipping unsupported disk type: ${name}`);
      continue;
    }

    const mountPoints = collectMountPoints(device);
    const path = `/dev/${name}`;
    const isLiveSystem = mountPoints.some((mp) => LIVE_MOUNT_POINTS.has(mp));
    if (isLiveSystem) {
      log.warn(`Detected disk that appears to be part of the live system: ${path}`);
    }

    disks.push({
      name,
      path,
      sizeBytes: toNumber(device.size),
      mountPoints,
      isRemovable: toBool(device.rm),
      isLiveSystem,
    });
  }

  log.info(`Found ${disks.length} usable disks`);
  return disks;
}

export async function getDiskInfo(exec: Exec = execSimple): Promise<DiskInfo[]> {
  log.info(`Executing command: lsblk ${LSBLK_ARGS.join(' ')}`);
  const { stdout } = await exec('lsblk', LSBLK_ARGS);
  return parseLsblkOutput(stdout);
}
