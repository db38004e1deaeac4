import { execSimple, type Exec } from './exec.js';
import { createLogger } from '../log/logger.js';

const log = createLogger('power');

export async function rebootSystem(exec: Exec = execSimple): Promise<void> {
  log.info('Rebooting system...');
  await exec('sudo', ['systemctl', 'reboot']);
}
