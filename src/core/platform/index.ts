import { hasBinary } from "./binaries.js";
import { findPortListeners } from "./ports.js";
import type { PortListenerLookup } from "./ports.js";
import { isProcessAlive, launchDetached, signalProcess } from "./processes.js";

export type { PortListenerLookup } from "./ports.js";

/**
 * Everything the supervisor asks of the operating system. Missing tools
 * surface as negative answers, never as thrown errors.
 */
export interface PlatformCapabilities {
  readonly platform: NodeJS.Platform;
  hasBinary(command: string): boolean;
  findPortListeners(port: number): Promise<PortListenerLookup>;
  signalProcess(pid: number, signal: NodeJS.Signals): boolean;
  isProcessAlive(pid: number): boolean;
  launchDetached(command: string, args: string[]): Promise<boolean>;
}

export function createNodePlatform(platform: NodeJS.Platform = process.platform): PlatformCapabilities {
  return {
    platform,
    hasBinary,
    findPortListeners,
    signalProcess,
    isProcessAlive,
    launchDetached
  };
}
