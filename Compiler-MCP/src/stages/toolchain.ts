/**
 * Command-line builders for the external compiler and runtime.
 *
 * Launchers are argument vectors rather than binary names, so a launcher
 * can be `['/opt/jdk/bin/javac']` or an interpreter plus a script.
 */

import { join } from 'node:path';
import type { ResourceLimits } from '../config.js';

export interface CommandLine {
  command: string;
  args: string[];
}

export interface Toolchain {
  /** File extension of compiled artifacts, including the dot */
  readonly artifactExtension: string;
  /** File extension of source files, including the dot */
  readonly sourceExtension: string;
  compileCommand(sourceFiles: readonly string[], outputDir: string): CommandLine;
  runCommand(mainClass: string, programArgs: readonly string[], classpath: string): CommandLine;
}

export interface JavaLaunchers {
  javac: readonly string[];
  java: readonly string[];
}

export type JavaToolchainLimits = Pick<
  ResourceLimits,
  'maxHeapMb' | 'maxStackKb' | 'maxMetaspaceMb' | 'maxDirectMemoryMb' | 'compilerHeapMb'
>;

function toCommandLine(launcher: readonly string[], args: string[]): CommandLine {
  const [command, ...prefix] = launcher;
  if (command === undefined) {
    throw new Error('Toolchain launcher must name a command');
  }
  return { command, args: [...prefix, ...args] };
}

/**
 * Launchers for a JDK: `<javaHome>/bin/javac` when a home is configured,
 * otherwise the given binary names resolved through PATH.
 */
export function resolveJavaLaunchers(javaHome: string, javacPath: string, javaPath: string): JavaLaunchers {
  if (javaHome) {
    return {
      javac: [join(javaHome, 'bin', 'javac')],
      java: [join(javaHome, 'bin', 'java')],
    };
  }
  return { javac: [javacPath], java: [javaPath] };
}

export class JavaToolchain implements Toolchain {
  readonly artifactExtension = '.class';
  readonly sourceExtension = '.java';

  constructor(
    private readonly launchers: JavaLaunchers,
    private readonly limits: JavaToolchainLimits,
    private readonly javaHome: string = '',
  ) {}

  compileCommand(sourceFiles: readonly string[], outputDir: string): CommandLine {
    const args = [
      `-J-Xmx${this.limits.compilerHeapMb}m`,
      '-d', outputDir,
      '-encoding', 'UTF-8',
      '-nowarn',
      '-g:none',
    ];
    if (this.javaHome) {
      args.push('--system', this.javaHome);
    }
    args.push(...sourceFiles);
    return toCommandLine(this.launchers.javac, args);
  }

  runCommand(mainClass: string, programArgs: readonly string[], classpath: string): CommandLine {
    return toCommandLine(this.launchers.java, [
      '-Xshare:auto',
      '-XX:+UseSerialGC',
      '-XX:TieredStopAtLevel=1',
      `-Xms${Math.min(8, this.limits.maxHeapMb)}m`,
      `-Xmx${this.limits.maxHeapMb}m`,
      `-Xss${this.limits.maxStackKb}k`,
      `-XX:MaxMetaspaceSize=${this.limits.maxMetaspaceMb}m`,
      `-XX:MaxDirectMemorySize=${this.limits.maxDirectMemoryMb}m`,
      '-XX:+ExitOnOutOfMemoryError',
      '-XX:+DisableAttachMechanism',
      '-Djava.awt.headless=true',
      '-Dfile.encoding=UTF-8',
      '-cp', classpath,
      mainClass,
      ...programArgs,
    ]);
  }
}
