import { createInterface } from "node:readline/promises";
import type { Readable, Writable } from "node:stream";
import {
  DeviceOpenError,
  DeviceSelectionCancelledError,
  NoDeviceAvailableError,
} from "../errors.ts";
import { DEFAULT_MAX_DEVICES, enumerateDevices } from "./device-enumerator.ts";
import type { DeviceProbe } from "./types.ts";

/** Picks one of the enumerated indices, or returns null when the operator cancels. */
export interface DeviceSelector {
  selectDevice(available: readonly number[]): Promise<number | null>;
}

/**
 * Uses a preconfigured index, or the first available one when none was given.
 * A configured index is returned as is; selectCameraIndex rejects it when it
 * was not enumerated.
 */
export class FixedDeviceSelector implements DeviceSelector {
  constructor(private readonly index?: number) {}

  async selectDevice(available: readonly number[]): Promise<number | null> {
    if (this.index === undefined) {
      return available[0] ?? null;
    }
    return this.index;
  }
}

export interface PromptDeviceSelectorOptions {
  input?: Readable;
  output?: Writable;
}

/** Asks on the terminal. Enter takes the first index; "q" cancels. */
export class PromptDeviceSelector implements DeviceSelector {
  private input: Readable;
  private output: Writable;

  constructor(options: PromptDeviceSelectorOptions = {}) {
    this.input = options.input ?? process.stdin;
    this.output = options.output ?? process.stdout;
  }

  async selectDevice(available: readonly number[]): Promise<number | null> {
    const fallback = available[0];
    if (fallback === undefined) return null;

    const rl = createInterface({ input: this.input, output: this.output, terminal: false });
    try {
      this.output.write(`Available cameras: ${available.join(", ")}\n`);
      for (;;) {
        const answer = (await rl.question(`Choose a camera [${fallback}] (q to cancel): `)).trim();
        if (answer === "") return fallback;
        if (answer.toLowerCase() === "q") return null;
        const index = Number.parseInt(answer, 10);
        if (String(index) === answer && available.includes(index)) {
          return index;
        }
        this.output.write(`"${answer}" is not one of: ${available.join(", ")}\n`);
      }
    } catch {
      // stdin closed before an answer
      return null;
    } finally {
      rl.close();
    }
  }
}

export interface SelectCameraOptions {
  probe: DeviceProbe;
  selector: DeviceSelector;
  maxDevices?: number;
}

/** Enumerate, then let the selector choose. Rejects when nothing can be used. */
export async function selectCameraIndex(options: SelectCameraOptions): Promise<number> {
  const maxDevices = options.maxDevices ?? DEFAULT_MAX_DEVICES;
  const available = await enumerateDevices(options.probe, { maxDevices });
  if (available.length === 0) {
    throw new NoDeviceAvailableError(maxDevices);
  }

  const selected = await options.selector.selectDevice(available);
  if (selected === null) {
    throw new DeviceSelectionCancelledError();
  }
  if (!available.includes(selected)) {
    throw new DeviceOpenError(selected, "not among the available cameras");
  }
  return selected;
}
