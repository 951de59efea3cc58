const IPV4_PATTERN = /^(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)\.(25[0-5]|2[0-4][0-9]|[01]?[0-9][0-9]?)$/;
const HOSTNAME_PATTERN = /^(([a-zA-Z0-9]|[a-zA-Z0-9][a-zA-Z0-9-]*[a-zA-Z0-9])\.)*([A-Za-z0-9]|[A-Za-z0-9][A-Za-z0-9-]*[A-Za-z0-9])$/;
const IPV6_PATTERN = /^[0-9a-fA-F:]+$/;

export const isValidIP = (ip: string): boolean => IPV4_PATTERN.test(ip);

export const isValidHostname = (host: string): boolean => host.length <= 253 && HOSTNAME_PATTERN.test(host);

export const isValidIPv6 = (ip: string): boolean => ip.includes(":") && ip.split(":").length <= 8 && IPV6_PATTERN.test(ip);

/**
 * A target is passed straight to the ping command line, so anything that is not a plain
 * address or hostname (leading dash, whitespace, shell characters) is refused.
 */
export function isValidTarget(target: string): boolean {
  if (!target || target !== target.trim()) return false;
  return isValidIP(target) || isValidIPv6(target) || isValidHostname(target);
}
