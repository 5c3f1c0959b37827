/**
 * TCP reachability probe for backend endpoints.
 *
 * Opens a plain TCP connection to the endpoint's host and port and closes it
 * as soon as it is established. No TLS or HTTP exchange happens, so a probe
 * costs one round trip and cannot hang on a slow server.
 */

import * as net from "node:net";

export interface ProbeTarget {
  host: string;
  port: number;
}

/** Default ports for URL schemes that leave the port implicit */
const DEFAULT_PORTS: Record<string, number> = {
  "http:": 80,
  "https:": 443,
};

/**
 * Host and port to probe for an endpoint URL, or null when the URL cannot be
 * parsed or has no usable port.
 */
export function probeTargetOf(endpoint: string): ProbeTarget | null {
  let url: URL;
  try {
    url = new URL(endpoint);
  } catch {
    return null;
  }

  const port = url.port ? Number(url.port) : DEFAULT_PORTS[url.protocol];
  if (port === undefined || !url.hostname) return null;

  // URL keeps the brackets around IPv6 literals
  const host = url.hostname.replace(/^\[(.*)\]$/, "$1");
  return { host, port };
}

/**
 * Resolve true if a TCP connection to the endpoint opens within
 * `timeoutMs`, false on refusal, DNS failure, timeout or a bad URL.
 * Never rejects.
 */
export function probeEndpoint(endpoint: string, timeoutMs: number): Promise<boolean> {
  const target = probeTargetOf(endpoint);
  if (target === null) return Promise.resolve(false);

  return new Promise((resolve) => {
    const socket = net.connect({ host: target.host, port: target.port });
    let settled = false;

    const finish = (reachable: boolean): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(reachable);
    };

    const timer = setTimeout(() => finish(false), timeoutMs);
    socket.once("connect", () => finish(true));
    socket.once("error", () => finish(false));
  });
}
