/**
 * @fileoverview Connectivity Monitor
 *
 * Svelte-store backed view of whether the backend is reachable. The host feeds
 * observations in through {@link ConnectivityMonitor.report} (a platform
 * network event, a failed request) or lets the monitor poll a probe.
 *
 * Subscribers get the current status immediately, then one event per
 * transition. Reconnect and disconnect callbacks run sequentially, in
 * registration order, and are awaited one after another so a slow callback
 * (e.g. re-validating the session) finishes before the next one (the queue
 * drain) starts.
 */

import { writable, type Readable } from 'svelte/store';
import { debugError, debugLog } from '../debug';
import { sleep } from '../utils';
import type { ConnectivityStatus } from '../types';

// Callbacks can be sync or async
type NetworkCallback = () => void | Promise<void>;

export interface ConnectivityMonitorOptions {
  /** Status before the first observation. Defaults to `'online'`. */
  initialStatus?: ConnectivityStatus;
  /** Reachability check used by {@link ConnectivityMonitor.startProbe}. */
  probe?: () => Promise<boolean>;
  /** Delay before reconnect callbacks run, to let the link settle. */
  reconnectDelayMs?: number;
}

export interface ConnectivityMonitor extends Readable<ConnectivityStatus> {
  currentStatus(): ConnectivityStatus;
  /** Feed an observation. Repeating the current status is a no-op. */
  report(status: ConnectivityStatus): void;
  onReconnect(callback: NetworkCallback): () => void;
  onDisconnect(callback: NetworkCallback): () => void;
  /** Resolves on the next `'online'` status, immediately if already online. */
  waitForOnline(): Promise<void>;
  /** Run the probe once and report its result. */
  checkNow(): Promise<ConnectivityStatus>;
  startProbe(intervalMs: number): void;
  stopProbe(): void;
  /** Resolves once every callback triggered so far has finished. */
  flush(): Promise<void>;
  destroy(): void;
}

export function createConnectivityMonitor(
  options: ConnectivityMonitorOptions = {}
): ConnectivityMonitor {
  const { subscribe, set } = writable<ConnectivityStatus>(options.initialStatus ?? 'online');
  const reconnectCallbacks: Set<NetworkCallback> = new Set();
  const disconnectCallbacks: Set<NetworkCallback> = new Set();
  const onlineWaiters: Set<() => void> = new Set();
  const reconnectDelayMs = options.reconnectDelayMs ?? 0;

  let currentValue: ConnectivityStatus = options.initialStatus ?? 'online';
  let callbackChain: Promise<void> = Promise.resolve();
  let probeTimer: ReturnType<typeof setInterval> | null = null;
  let probeInFlight: Promise<ConnectivityStatus> | null = null;
  let destroyed = false;

  async function runCallbacksSequentially(
    callbacks: Set<NetworkCallback>,
    label: string
  ): Promise<void> {
    // Snapshot so a callback that unregisters itself doesn't skip the next one
    for (const callback of Array.from(callbacks)) {
      try {
        await callback();
      } catch (e) {
        debugError(`[NETWORK] ${label} callback error:`, e);
      }
    }
  }

  function report(status: ConnectivityStatus): void {
    if (destroyed || status === currentValue) return;
    currentValue = status;
    set(status);
    debugLog(`[NETWORK] Status changed: ${status}`);

    if (status === 'online') {
      for (const resolve of onlineWaiters) resolve();
      onlineWaiters.clear();
      callbackChain = callbackChain.then(async () => {
        if (reconnectDelayMs > 0) await sleep(reconnectDelayMs);
        // The link may have dropped again while we waited
        if (currentValue !== 'online') return;
        await runCallbacksSequentially(reconnectCallbacks, 'Reconnect');
      });
    } else {
      callbackChain = callbackChain.then(() =>
        runCallbacksSequentially(disconnectCallbacks, 'Disconnect')
      );
    }
  }

  function onReconnect(callback: NetworkCallback): () => void {
    reconnectCallbacks.add(callback);
    return () => reconnectCallbacks.delete(callback);
  }

  function onDisconnect(callback: NetworkCallback): () => void {
    disconnectCallbacks.add(callback);
    return () => disconnectCallbacks.delete(callback);
  }

  function waitForOnline(): Promise<void> {
    if (currentValue === 'online') return Promise.resolve();
    return new Promise<void>((resolve) => {
      onlineWaiters.add(resolve);
    });
  }

  function checkNow(): Promise<ConnectivityStatus> {
    const probe = options.probe;
    if (!probe) return Promise.resolve(currentValue);
    // Overlapping checks share one probe request
    if (probeInFlight) return probeInFlight;

    probeInFlight = probe()
      .then(
        (reachable): ConnectivityStatus => (reachable ? 'online' : 'offline'),
        (e: unknown): ConnectivityStatus => {
          debugLog('[NETWORK] Probe failed:', e);
          return 'offline';
        }
      )
      .then((status) => {
        probeInFlight = null;
        report(status);
        return status;
      });
    return probeInFlight;
  }

  function startProbe(intervalMs: number): void {
    if (destroyed || !options.probe) return;
    stopProbe();
    probeTimer = setInterval(() => {
      void checkNow();
    }, intervalMs);
  }

  function stopProbe(): void {
    if (probeTimer !== null) {
      clearInterval(probeTimer);
      probeTimer = null;
    }
  }

  function destroy(): void {
    destroyed = true;
    stopProbe();
    reconnectCallbacks.clear();
    disconnectCallbacks.clear();
    onlineWaiters.clear();
  }

  return {
    subscribe,
    currentStatus: () => currentValue,
    report,
    onReconnect,
    onDisconnect,
    waitForOnline,
    checkNow,
    startProbe,
    stopProbe,
    flush: () => callbackChain,
    destroy
  };
}
