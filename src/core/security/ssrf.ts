/**
 * SSRF guard for outbound webhook URLs: only http(s) targets whose host, and
 * every address it resolves to, sit outside private and link-local ranges.
 */

import dns from "node:dns/promises";
import net from "node:net";
import { withTimeout } from "../timeout.js";

const BLOCKED_HOSTNAMES = new Set(["localhost", "metadata.google.internal"]);
const BLOCKED_SUFFIXES = [".internal", ".local", ".localhost"];
const DNS_LOOKUP_TIMEOUT_MS = 5_000;

const blockList = new net.BlockList();
for (const [prefix, bits] of [
  ["0.0.0.0", 8],
  ["10.0.0.0", 8],
  ["100.64.0.0", 10],
  ["127.0.0.0", 8],
  ["169.254.0.0", 16],
  ["172.16.0.0", 12],
  ["192.168.0.0", 16],
] as const) {
  blockList.addSubnet(prefix, bits, "ipv4");
}
for (const [prefix, bits] of [
  ["fc00::", 7],
  ["fe80::", 10],
] as const) {
  blockList.addSubnet(prefix, bits, "ipv6");
}
blockList.addAddress("::1", "ipv6");
blockList.addAddress("::", "ipv6");

export function isBlockedAddress(address: string): boolean {
  const bare = address.replace(/^\[|\]$/g, "").split("%")[0] ?? address;
  const version = net.isIP(bare);
  if (version === 4) return blockList.check(bare, "ipv4");
  if (version === 6) {
    const mapped = bare.toLowerCase().match(/^::ffff:(\d+\.\d+\.\d+\.\d+)$/);
    if (mapped?.[1]) return blockList.check(mapped[1], "ipv4");
    return blockList.check(bare, "ipv6");
  }
  return false;
}

function isBlockedHostname(hostname: string): boolean {
  const host = hostname.toLowerCase();
  if (BLOCKED_HOSTNAMES.has(host)) return true;
  if (BLOCKED_SUFFIXES.some((suffix) => host.endsWith(suffix))) return true;
  return isBlockedAddress(host);
}

function parseHttpUrl(urlString: string): URL | null {
  try {
    const parsed = new URL(urlString);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") return null;
    return parsed.hostname ? parsed : null;
  } catch {
    return null;
  }
}

/**
 * http(s) only, host not a blocked name or literal, and every address the
 * host resolves to outside blocked ranges (DNS rebinding). A lookup that
 * fails or outlasts its deadline counts as unsafe.
 */
export async function isUrlSafeWithDns(
  urlString: string,
  lookupTimeoutMs: number = DNS_LOOKUP_TIMEOUT_MS
): Promise<boolean> {
  const parsed = parseHttpUrl(urlString);
  if (!parsed || isBlockedHostname(parsed.hostname)) return false;

  const host = parsed.hostname.replace(/^\[|\]$/g, "");
  if (net.isIP(host)) return true;

  try {
    const addresses = await withTimeout(dns.lookup(host, { all: true, verbatim: true }), lookupTimeoutMs, `DNS lookup for ${host}`);
    return addresses.length > 0 && addresses.every((entry) => !isBlockedAddress(entry.address));
  } catch {
    return false;
  }
}
