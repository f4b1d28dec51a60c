export interface Frame {
  width: number;
  height: number;
  data: Uint8ClampedArray;
  timestamp: number;
}

/**
 * One camera device. `open` rejects with DeviceOpenError, `nextFrame` with
 * ReadError; `close` may be called any number of times.
 */
export interface CameraSource {
  readonly deviceIndex: number;
  open(): Promise<void>;
  nextFrame(): Promise<Frame>;
  close(): void;
  isOpen(): boolean;
}

export type CameraFactory = (deviceIndex: number) => CameraSource;

/** Resolves when the device can be opened and closed again; rejects otherwise. */
export type DeviceProbe = (deviceIndex: number) => Promise<void>;
