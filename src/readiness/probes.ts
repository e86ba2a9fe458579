/**
 * Reachability probes. A probe resolves when the target answers and rejects
 * otherwise; it must stop as soon as its signal aborts.
 */

import { connect } from "node:net";
import type { ProbeSpec } from "../types.js";

export type Probe = (address: string, signal: AbortSignal) => Promise<void>;

export type ProbeFactory = (spec: ProbeSpec) => Probe;

export function tcpProbe(port: number): Probe {
  return (address, signal) =>
    new Promise<void>((resolve, reject) => {
      if (signal.aborted) {
        reject(new Error(`tcp ${address}:${port} aborted`));
        return;
      }
      const socket = connect({ host: address, port });
      const onAbort = () => {
        socket.destroy();
        reject(new Error(`tcp ${address}:${port} aborted`));
      };
      signal.addEventListener("abort", onAbort, { once: true });
      socket.once("connect", () => {
        signal.removeEventListener("abort", onAbort);
        socket.end();
        resolve();
      });
      socket.once("error", (err) => {
        signal.removeEventListener("abort", onAbort);
        socket.destroy();
        reject(err);
      });
    });
}

export type HttpExpectation = {
  /** Exact status; any 2xx or 3xx when omitted. */
  status?: number;
  /** Substring the response body must contain. */
  body?: string;
};

export function httpProbe(port: number, path: string, expect: HttpExpectation = {}): Probe {
  return async (address, signal) => {
    const url = `http://${address}:${port}${path}`;
    const response = await fetch(url, { signal, redirect: "manual" });
    const ok = expect.status !== undefined
      ? response.status === expect.status
      : response.status >= 200 && response.status < 400;
    if (!ok) {
      await response.body?.cancel();
      throw new Error(`GET ${url} returned ${response.status}`);
    }
    if (expect.body === undefined) {
      await response.body?.cancel();
      return;
    }
    const text = await response.text();
    if (!text.includes(expect.body)) {
      throw new Error(`GET ${url} returned ${response.status} without "${expect.body}" in the body`);
    }
  };
}

export const createProbe: ProbeFactory = (spec) =>
  spec.type === "tcp"
    ? tcpProbe(spec.port)
    : httpProbe(spec.port, spec.path, { status: spec.expectStatus, body: spec.expectBody });

/** Short label such as `tcp/22` or `http:8080/login`. */
export function describeProbe(spec: ProbeSpec): string {
  return spec.type === "tcp" ? `tcp/${spec.port}` : `http:${spec.port}${spec.path}`;
}
