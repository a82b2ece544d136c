/**
 * Base for devices that push frames into a latest-wins slot
 */

import { DeviceClosedError, ReadTimeoutError, type CaptureSettings, type Frame } from '@tankview/shared';
import { FrameSlot } from '@tankview/vision';
import type { CaptureDevice, CaptureReadOptions } from '../types.js';

export abstract class SlotCaptureDevice implements CaptureDevice {
  abstract readonly settings: CaptureSettings;
  protected readonly cameraIndex: number;
  private readonly slot: FrameSlot<Frame>;
  private lastRead = 0;
  private closed = false;

  constructor(cameraIndex: number) {
    this.cameraIndex = cameraIndex;
    this.slot = new FrameSlot<Frame>({
      onTimeout: (timeoutMs) => new ReadTimeoutError(cameraIndex, timeoutMs),
    });
  }

  async read(options: CaptureReadOptions = {}): Promise<Frame> {
    const frame = await this.slot.nextAfter(this.lastRead, options);
    this.lastRead = this.slot.getVersion();
    return frame;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.release();
    this.slot.close(new DeviceClosedError(this.cameraIndex));
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Hand a freshly captured frame to readers; older unread frames are dropped
   */
  protected publish(frame: Frame): void {
    this.slot.publish(frame);
  }

  /**
   * The device can no longer produce frames
   */
  protected fail(reason: string): void {
    this.slot.close(new DeviceClosedError(this.cameraIndex, reason));
  }

  /**
   * Backend-specific handle release
   */
  protected abstract release(): Promise<void>;
}
