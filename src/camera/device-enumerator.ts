import { DeviceProbeError, describeError } from "../errors.ts";
import { getLogger } from "../logger.ts";
import type { CameraFactory, DeviceProbe } from "./types.ts";

const logger = getLogger("device-enumerator");

export const DEFAULT_MAX_DEVICES = 5;

export interface EnumerateOptions {
  maxDevices?: number;
}

/** A probe that opens the device through `factory` and closes it straight away. */
export function createCameraProbe(factory: CameraFactory): DeviceProbe {
  return async (deviceIndex) => {
    const camera = factory(deviceIndex);
    try {
      await camera.open();
    } finally {
      camera.close();
    }
  };
}

/**
 * Probes indices `0 … maxDevices-1` one at a time and returns those that
 * opened. A failing probe only drops its index; this never rejects.
 */
export async function enumerateDevices(
  probe: DeviceProbe,
  options: EnumerateOptions = {},
): Promise<number[]> {
  const maxDevices = options.maxDevices ?? DEFAULT_MAX_DEVICES;
  const available: number[] = [];

  for (let index = 0; index < maxDevices; index++) {
    try {
      await probe(index);
      available.push(index);
    } catch (error) {
      const failure = new DeviceProbeError(index, error);
      logger.debug(failure.message, { deviceIndex: index, reason: describeError(error) });
    }
  }

  logger.info("Camera enumeration finished", { maxDevices, available });
  return available;
}
