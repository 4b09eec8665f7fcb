/**
 * Host audio stack detection and player launch arguments
 *
 * Decided once when the player starts; never re-evaluated while it runs.
 */

import { execFile } from 'child_process';
import { readFile } from 'fs/promises';
import { promisify } from 'util';
import which from 'which';
import {
  AudioEnvironment,
  AudioOutputSelection,
  PlayerLaunchOptions,
  StartupDiagnostics
} from '../../domain/player/types';

const execFileAsync = promisify(execFile);

const PROBE_TIMEOUT_MS = 2000;

/**
 * Pick the `--ao` preference order for the detected environment
 */
export function selectAudioOutput(env: AudioEnvironment): AudioOutputSelection {
  if (env.isRaspberryPi) {
    return {
      label: 'Raspberry Pi (ALSA first)',
      args: [
        '--ao=alsa,pulse,pipewire,',
        '--audio-device=auto',
        '--audio-samplerate=44100',
        '--audio-format=s16'
      ]
    };
  }

  if (env.hasPipeWire) {
    return { label: 'PipeWire', args: ['--ao=pipewire,pulse,alsa,', '--audio-device=auto'] };
  }

  if (env.hasPulseAudio) {
    return { label: 'PulseAudio', args: ['--ao=pulse,alsa,', '--audio-device=auto'] };
  }

  return { label: 'default', args: ['--ao=pulse,alsa,pipewire,', '--audio-device=auto'] };
}

/**
 * Full player command line (without the binary)
 */
export function buildPlayerArgs(options: PlayerLaunchOptions, output: AudioOutputSelection): string[] {
  return [
    '--no-video',
    '--idle=yes',
    `--input-ipc-server=${options.socketPath}`,
    `--volume=${options.initialVolume}`,
    ...output.args,
    '--no-terminal',
    '--msg-level=all=info'
  ];
}

/**
 * True when /proc/cpuinfo names a Raspberry Pi or a Broadcom SoC
 */
export function isRaspberryPiCpuInfo(cpuinfo: string): boolean {
  const text = cpuinfo.toLowerCase();
  return text.includes('raspberry pi') || text.includes('bcm');
}

async function readCpuInfo(): Promise<string> {
  try {
    return await readFile('/proc/cpuinfo', 'utf8');
  } catch {
    return '';
  }
}

async function isOnPath(command: string): Promise<boolean> {
  return (await which(command, { nothrow: true })) !== null;
}

async function run(command: string, args: string[], timeout = PROBE_TIMEOUT_MS): Promise<string | null> {
  try {
    const { stdout } = await execFileAsync(command, args, { timeout, encoding: 'utf8' });
    return stdout;
  } catch {
    return null;
  }
}

/**
 * Probe the host: Pi hardware, then `pactl info` to tell PipeWire from PulseAudio
 */
export async function detectAudioEnvironment(): Promise<AudioEnvironment> {
  const isRaspberryPi = isRaspberryPiCpuInfo(await readCpuInfo());

  let hasPipeWire = false;
  let hasPulseAudio = false;
  if (await isOnPath('pactl')) {
    const info = await run('pactl', ['info']);
    if (info !== null) {
      hasPipeWire = info.toLowerCase().includes('pipewire');
      hasPulseAudio = !hasPipeWire;
    }
  }

  return { isRaspberryPi, hasPipeWire, hasPulseAudio };
}

/**
 * Names of the current user's groups that look audio related
 */
export function audioGroupsFrom(groupList: string): string[] {
  return groupList
    .split(/\s+/)
    .filter((group) => group.toLowerCase().includes('audio'));
}

/**
 * Gather what an operator needs after a failed start
 */
export async function collectStartupDiagnostics(binary: string): Promise<StartupDiagnostics> {
  const [versionOut, pactlAvailable, aplayAvailable, groupsOut] = await Promise.all([
    run(binary, ['--version'], 5000),
    isOnPath('pactl'),
    isOnPath('aplay'),
    run('id', ['-Gn'])
  ]);

  const alsaDevices = aplayAvailable ? await run('aplay', ['-l'], 5000) : null;

  return {
    playerVersion: versionOut ? versionOut.split('\n')[0].trim() : null,
    pactlAvailable,
    aplayAvailable,
    alsaDevices: alsaDevices ? alsaDevices.trim() : null,
    audioGroups: groupsOut ? audioGroupsFrom(groupsOut) : []
  };
}
