/**
 * In-process transport connecting several sync managers.
 *
 * Messages are encoded to wire bytes and decoded again for every receiver,
 * then delivered on a later microtask. Delivery failures never reach the
 * sender; they are published on `errors$`.
 *
 * @example
 * ```typescript
 * const hub = new InMemoryTransportHub();
 * const laptop = createMultiDeviceSyncManager({
 *   deviceId: 'laptop',
 *   deviceName: 'Laptop',
 *   transport: hub.transportFor('laptop'),
 * });
 * hub.connect(laptop);
 *
 * await laptop.start();
 * await hub.flush();
 * ```
 */

import { DriftError, ensureDriftError } from '@driftsync/core';
import { Subject, type Observable } from 'rxjs';
import { decodeSyncMessage, encodeSyncMessage } from './sync-message.js';
import type { SyncMessage, SyncTransport } from './types.js';

/**
 * Anything that can receive messages from the hub
 */
export interface SyncEndpoint {
  readonly deviceId: string;
  handleIncoming(message: SyncMessage): Promise<void>;
}

export interface DeliveryFailure {
  deviceId: string;
  messageId: string;
  error: DriftError;
}

export class InMemoryTransportHub {
  private readonly endpoints = new Map<string, SyncEndpoint>();
  private readonly partitioned = new Set<string>();
  private readonly inflight = new Set<Promise<void>>();
  private readonly errorsSubject$ = new Subject<DeliveryFailure>();
  private delivered = 0;

  readonly errors$: Observable<DeliveryFailure> = this.errorsSubject$.asObservable();

  /** Messages handed to a receiver so far */
  get deliveredCount(): number {
    return this.delivered;
  }

  /**
   * Register an endpoint. Returns a function that disconnects it.
   */
  connect(endpoint: SyncEndpoint): () => void {
    this.endpoints.set(endpoint.deviceId, endpoint);
    return () => {
      if (this.endpoints.get(endpoint.deviceId) === endpoint) {
        this.endpoints.delete(endpoint.deviceId);
      }
    };
  }

  /**
   * Transport for the device with the given id
   */
  transportFor(deviceId: string): SyncTransport {
    return {
      send: (message, targetDeviceId) => {
        this.route(deviceId, message, [targetDeviceId]);
        return Promise.resolve();
      },
      broadcast: (message) => {
        const targets = Array.from(this.endpoints.keys()).filter((id) => id !== deviceId);
        this.route(deviceId, message, targets);
        return Promise.resolve();
      },
    };
  }

  /**
   * Cut a device off. Messages to and from it are dropped until it is
   * reconnected with `setPartitioned(id, false)`.
   */
  setPartitioned(deviceId: string, partitioned: boolean): void {
    if (partitioned) {
      this.partitioned.add(deviceId);
    } else {
      this.partitioned.delete(deviceId);
    }
  }

  /**
   * Wait until every queued delivery, and every delivery it caused, settles
   */
  async flush(): Promise<void> {
    while (this.inflight.size > 0) {
      await Promise.all(Array.from(this.inflight));
    }
  }

  dispose(): void {
    this.endpoints.clear();
    this.partitioned.clear();
    this.errorsSubject$.complete();
  }

  private route(sourceDeviceId: string, message: SyncMessage, targets: string[]): void {
    if (this.partitioned.has(sourceDeviceId)) return;

    const bytes = encodeSyncMessage(message);
    for (const target of targets) {
      if (this.partitioned.has(target)) continue;

      const endpoint = this.endpoints.get(target);
      if (!endpoint) {
        this.errorsSubject$.next({
          deviceId: target,
          messageId: message.id,
          error: new DriftError({ code: 'DRIFT_D501', context: { deviceId: target } }),
        });
        continue;
      }
      this.enqueue(endpoint, message.id, bytes);
    }
  }

  private enqueue(endpoint: SyncEndpoint, messageId: string, bytes: Uint8Array): void {
    const delivery: Promise<void> = Promise.resolve()
      .then(() => {
        this.delivered++;
        return endpoint.handleIncoming(decodeSyncMessage(bytes));
      })
      .catch((error: unknown) => {
        this.errorsSubject$.next({
          deviceId: endpoint.deviceId,
          messageId,
          error: ensureDriftError(error),
        });
      })
      .finally(() => {
        this.inflight.delete(delivery);
      });
    this.inflight.add(delivery);
  }
}
