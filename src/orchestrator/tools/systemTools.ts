import * as os from 'os';
import { execFile } from 'child_process';
import { promisify } from 'util';
import { Tool } from '../types.js';

const execFileAsync = promisify(execFile);

const GB = 1024 ** 3;

function formatUptime(seconds: number): string {
  const hours = Math.floor(seconds / 3600);
  const minutes = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${minutes}m`;
}

export const getSystemInfoTool: Tool = {
  name: 'get_system_info',
  invoke: async () => {
    const cpus = os.cpus();
    const total = os.totalmem();
    const used = total - os.freemem();

    return [
      'System Information:',
      `OS: ${os.type()} ${os.release()} (${os.arch()})`,
      `Host: ${os.hostname()}`,
      `CPU: ${cpus[0]?.model.trim() ?? 'unknown'} (${cpus.length} cores)`,
      `Memory: ${(used / GB).toFixed(1)} GB used of ${(total / GB).toFixed(1)} GB (${((used / total) * 100).toFixed(0)}%)`,
      `Uptime: ${formatUptime(os.uptime())}`
    ].join('\n');
  }
};

export const PROCESS_LIMIT = 10;

export const getRunningProcessesTool: Tool = {
  name: 'get_running_processes',
  invoke: async (_query, context) => {
    const windows = process.platform === 'win32';
    const { stdout } = windows
      ? await execFileAsync('tasklist', ['/fo', 'table'], { signal: context.signal, windowsHide: true })
      : await execFileAsync('ps', ['-eo', 'pid,comm,%cpu,%mem', '--sort=-%cpu'], { signal: context.signal });

    const lines = stdout.trim().split('\n');
    const header = windows ? lines.slice(0, 3) : lines.slice(0, 1);
    const rows = lines.slice(header.length, header.length + PROCESS_LIMIT);

    return [`Top ${rows.length} processes:`, ...header, ...rows].join('\n');
  }
};

export const getNetworkInfoTool: Tool = {
  name: 'get_network_info',
  invoke: async () => {
    const lines = [`Network Information:`, `Hostname: ${os.hostname()}`];

    for (const [name, addresses] of Object.entries(os.networkInterfaces())) {
      for (const address of addresses ?? []) {
        if (address.internal) continue;
        lines.push(`${name}: ${address.address} (${address.family})`);
      }
    }

    if (lines.length === 2) {
      lines.push('No external network interfaces found');
    }

    return lines.join('\n');
  }
};

export const allSystemTools = [
  getSystemInfoTool,
  getRunningProcessesTool,
  getNetworkInfoTool
];
