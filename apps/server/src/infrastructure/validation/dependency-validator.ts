/**
 * Dependency validation utility for external executables
 */

import which from 'which';
import { Result } from '@queuecast/shared';

export type DependencyError = 'DEPENDENCY_MISSING';

/**
 * Executables the player host relies on. The player is required; the audio tools only
 * feed backend detection and diagnostics.
 */
export interface DependencyReport {
  readonly isValid: boolean;
  readonly available: Readonly<Record<string, string>>;
  readonly missingRequired: readonly string[];
  readonly missingOptional: readonly string[];
}

const OPTIONAL_TOOLS: Readonly<Record<string, string>> = {
  pactl: 'PulseAudio/PipeWire detection',
  aplay: 'ALSA device diagnostics'
};

/**
 * Lookup of a command on PATH; replaced in tests
 */
export type CommandLocator = (command: string) => Promise<string | null>;

export const whichLocator: CommandLocator = (command) => which(command, { nothrow: true });

export class DependencyValidator {
  constructor(
    private readonly playerBinary: string,
    private readonly locate: CommandLocator = whichLocator
  ) {}

  async checkAll(): Promise<DependencyReport> {
    const commands = [this.playerBinary, ...Object.keys(OPTIONAL_TOOLS)];
    const located = await Promise.all(commands.map((command) => this.checkDependency(command)));

    const available: Record<string, string> = {};
    const missingRequired: string[] = [];
    const missingOptional: string[] = [];

    located.forEach((result, index) => {
      const command = commands[index];
      if (result.success) {
        available[command] = result.value;
      } else if (index === 0) {
        missingRequired.push(command);
      } else {
        missingOptional.push(command);
      }
    });

    return {
      isValid: missingRequired.length === 0,
      available,
      missingRequired,
      missingOptional
    };
  }

  async checkDependency(command: string): Promise<Result<string, string>> {
    try {
      const path = await this.locate(command);
      return path
        ? { success: true, value: path }
        : { success: false, error: `Command '${command}' not found in PATH` };
    } catch (error) {
      return { success: false, error: `Command '${command}' lookup failed: ${String(error)}` };
    }
  }

  /**
   * Log what is installed; fails only when the player itself is missing
   */
  async validateAtStartup(): Promise<Result<DependencyReport, DependencyError>> {
    console.log('Validating external dependencies...');
    const report = await this.checkAll();

    for (const command of report.missingOptional) {
      console.warn(`Optional tool '${command}' not found (${OPTIONAL_TOOLS[command]})`);
    }

    if (!report.isValid) {
      console.error(`Missing required dependency: ${report.missingRequired.join(', ')}`);
      console.error('Install suggestions:');
      for (const suggestion of getInstallationSuggestions(this.playerBinary)) {
        console.error(`  ${suggestion}`);
      }
      return { success: false, error: 'DEPENDENCY_MISSING' };
    }

    console.log(`✅ Player found at ${report.available[this.playerBinary]}`);
    return { success: true, value: report };
  }
}

export function getInstallationSuggestions(playerBinary: string): string[] {
  return [
    `apt-get install ${playerBinary}  # Debian/Ubuntu/Raspberry Pi OS`,
    `pacman -S ${playerBinary}        # Arch Linux`,
    `brew install ${playerBinary}     # macOS`
  ];
}
