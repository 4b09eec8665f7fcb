/**
 * PlayerSupervisor: lifecycle of the external mpv process
 *
 * Starts the player with an IPC socket, checks it is alive before use, restarts it
 * when it dies or stops answering, and tears it down exactly once on shutdown.
 */

import { spawn } from 'child_process';
import { existsSync, unlinkSync } from 'fs';
import { Result } from '@queuecast/shared';
import { IPlayerSupervisor, IpcTransport } from '../../domain/player/interfaces';
import {
  AudioEnvironment,
  PlayerLaunchOptions,
  PlayerProcess,
  StartupDiagnostics,
  SupervisorState
} from '../../domain/player/types';
import { SupervisorError } from '../../domain/player/errors';
import {
  buildPlayerArgs,
  collectStartupDiagnostics,
  detectAudioEnvironment,
  selectAudioOutput
} from './AudioEnvironment';

/**
 * Timing limits for start, probe and stop
 */
export interface SupervisorLimits {
  /** socket/process checks after spawn before giving up */
  readonly startupAttempts: number;
  readonly startupPollMs: number;
  readonly probeTimeoutMs: number;
  /** time between SIGTERM and SIGKILL */
  readonly stopGraceMs: number;
}

export const DEFAULT_SUPERVISOR_LIMITS: SupervisorLimits = {
  startupAttempts: 10,
  startupPollMs: 100,
  probeTimeoutMs: 2000,
  stopGraceMs: 1000
};

/**
 * Host operations the supervisor performs; replaced in tests
 */
export interface SupervisorRuntime {
  spawnPlayer(binary: string, args: string[]): PlayerProcess;
  socketExists(path: string): boolean;
  removeSocket(path: string): void;
  detectAudioEnvironment(): Promise<AudioEnvironment>;
  collectDiagnostics(binary: string): Promise<StartupDiagnostics>;
  sleep(ms: number): Promise<void>;
}

export const nodeSupervisorRuntime: SupervisorRuntime = {
  spawnPlayer: (binary, args) => spawn(binary, args, { stdio: 'ignore', detached: false }),
  socketExists: (path) => existsSync(path),
  removeSocket: (path) => {
    if (existsSync(path)) {
      unlinkSync(path);
    }
  },
  detectAudioEnvironment,
  collectDiagnostics: collectStartupDiagnostics,
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms))
};

const PROBE_MESSAGE = JSON.stringify({ command: ['get_property', 'idle-active'] });

export class PlayerSupervisor implements IPlayerSupervisor {
  private state: SupervisorState = 'not_started';
  private player: PlayerProcess | null = null;
  private exited = true;
  private inFlight: Promise<Result<void, SupervisorError>> | null = null;
  private shutdownPromise: Promise<void> | null = null;
  private readonly limits: SupervisorLimits;

  constructor(
    private readonly options: PlayerLaunchOptions,
    private readonly transport: IpcTransport,
    private readonly runtime: SupervisorRuntime = nodeSupervisorRuntime,
    limits: Partial<SupervisorLimits> = {}
  ) {
    this.limits = { ...DEFAULT_SUPERVISOR_LIMITS, ...limits };
  }

  /**
   * Make sure a responsive player is running. Concurrent callers share one attempt.
   */
  ensureRunning(): Promise<Result<void, SupervisorError>> {
    if (!this.inFlight) {
      this.inFlight = this.checkOrRestart().finally(() => {
        this.inFlight = null;
      });
    }
    return this.inFlight;
  }

  isReady(): boolean {
    return this.state === 'running' && this.isAlive() && this.socketExists();
  }

  getState(): SupervisorState {
    return this.state;
  }

  getPid(): number | null {
    return this.player?.pid ?? null;
  }

  socketExists(): boolean {
    return this.runtime.socketExists(this.options.socketPath);
  }

  /**
   * Terminate gracefully, force-kill after the grace period, remove the socket.
   * Every caller receives the same promise.
   */
  shutdown(): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.performShutdown();
    }
    return this.shutdownPromise;
  }

  /**
   * Last-chance cleanup for the process 'exit' hook, where nothing async runs
   */
  shutdownSync(): void {
    try {
      if (this.player && this.isAlive()) {
        this.player.kill('SIGKILL');
      }
      this.runtime.removeSocket(this.options.socketPath);
    } catch (error) {
      console.error('Synchronous player cleanup failed:', error);
    }
  }

  private async checkOrRestart(): Promise<Result<void, SupervisorError>> {
    if (this.shutdownPromise) {
      return { success: false, error: 'SHUTTING_DOWN' };
    }

    if (this.state === 'not_started' || this.state === 'dead' || !this.isAlive()) {
      console.warn('Player process is not running, starting it...');
      return this.restart();
    }

    if (!this.socketExists()) {
      console.warn(`Player socket ${this.options.socketPath} missing, restarting player...`);
      return this.restart();
    }

    if (!(await this.probe())) {
      console.warn('Player not responsive, restarting...');
      return this.restart();
    }

    return { success: true, value: undefined };
  }

  private async probe(): Promise<boolean> {
    try {
      await this.transport.exchange(this.options.socketPath, PROBE_MESSAGE, this.limits.probeTimeoutMs);
      return true;
    } catch {
      return false;
    }
  }

  private async restart(): Promise<Result<void, SupervisorError>> {
    this.state = 'starting';

    await this.terminateCurrent();
    this.safeRemoveSocket();

    let env: AudioEnvironment;
    try {
      env = await this.runtime.detectAudioEnvironment();
    } catch (error) {
      console.warn('Audio environment detection failed, using defaults:', error);
      env = { isRaspberryPi: false, hasPipeWire: false, hasPulseAudio: false };
    }

    const output = selectAudioOutput(env);
    const args = buildPlayerArgs(this.options, output);
    console.log(`Starting player (${output.label} audio): ${this.options.binary} ${args.join(' ')}`);

    let player: PlayerProcess;
    try {
      player = this.runtime.spawnPlayer(this.options.binary, args);
    } catch (error) {
      console.error('Player spawn failed:', error);
      return this.startupFailed(null);
    }
    this.track(player);

    for (let attempt = 0; attempt < this.limits.startupAttempts; attempt++) {
      await this.runtime.sleep(this.limits.startupPollMs);

      if (this.exited) {
        console.error(`Player exited during startup (code ${player.exitCode ?? 'none'})`);
        return this.startupFailed(player);
      }

      if (this.socketExists()) {
        break;
      }
    }

    if (this.exited || !this.socketExists()) {
      console.error(`Player socket ${this.options.socketPath} was not created`);
      return this.startupFailed(player);
    }

    this.state = 'running';
    console.log(`Player started with PID ${player.pid ?? 'unknown'}`);
    return { success: true, value: undefined };
  }

  private track(player: PlayerProcess): void {
    this.player = player;
    this.exited = false;

    player.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
      if (this.player !== player) return;
      this.exited = true;
      if (this.state === 'running') {
        console.warn(`Player exited (code ${code}, signal ${signal}); restart on next use`);
        this.state = 'dead';
      }
    });

    player.on('error', (error: Error) => {
      if (this.player !== player) return;
      console.error('Player process error:', error.message);
      this.exited = true;
    });
  }

  private async startupFailed(player: PlayerProcess | null): Promise<Result<void, SupervisorError>> {
    try {
      const diagnostics = await this.runtime.collectDiagnostics(this.options.binary);
      logDiagnostics(diagnostics);
    } catch (error) {
      console.error('Could not collect player diagnostics:', error);
    }

    if (player) {
      await this.terminateCurrent();
    }
    this.state = 'dead';
    return { success: false, error: 'STARTUP_FAILED' };
  }

  private isAlive(): boolean {
    return this.player !== null
      && !this.exited
      && this.player.exitCode === null
      && this.player.signalCode === null;
  }

  /**
   * SIGTERM, wait up to the grace period, then SIGKILL
   */
  private async terminateCurrent(): Promise<void> {
    const player = this.player;
    if (!player || !this.isAlive()) {
      this.player = null;
      this.exited = true;
      return;
    }

    const exitedInTime = new Promise<boolean>((resolve) => {
      const timer = setTimeout(() => resolve(false), this.limits.stopGraceMs);
      player.once('exit', () => {
        clearTimeout(timer);
        resolve(true);
      });
    });

    player.kill('SIGTERM');
    if (!(await exitedInTime)) {
      console.warn(`Player ${player.pid ?? ''} ignored SIGTERM, killing`);
      player.kill('SIGKILL');
    }

    this.player = null;
    this.exited = true;
  }

  private safeRemoveSocket(): void {
    try {
      this.runtime.removeSocket(this.options.socketPath);
    } catch (error) {
      console.error(`Could not remove socket ${this.options.socketPath}:`, error);
    }
  }

  private async performShutdown(): Promise<void> {
    console.log('Shutting down player...');
    if (this.inFlight) {
      await this.inFlight;
    }

    try {
      await this.terminateCurrent();
    } catch (error) {
      console.error('Player termination failed:', error);
    }
    this.safeRemoveSocket();
    this.state = 'dead';
    console.log('Player shut down');
  }
}

function logDiagnostics(diagnostics: StartupDiagnostics): void {
  console.log('Player diagnostics:');
  if (diagnostics.playerVersion) {
    console.log(`   - version: ${diagnostics.playerVersion}`);
  } else {
    console.error('   - player binary not found or not executable');
  }
  console.log(`   - pactl available: ${diagnostics.pactlAvailable}`);
  console.log(`   - aplay available: ${diagnostics.aplayAvailable}`);
  if (diagnostics.alsaDevices) {
    console.log(`   - ALSA devices:\n${diagnostics.alsaDevices}`);
  } else {
    console.warn('   - no ALSA devices found');
  }
  if (diagnostics.audioGroups.length === 0) {
    console.warn('   - user is not in an audio group; audio output may fail');
  } else {
    console.log(`   - audio groups: ${diagnostics.audioGroups.join(', ')}`);
  }
}
