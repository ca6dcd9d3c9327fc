/**
 * Cloud-Init Profiles
 *
 * User data passed to Hetzner when a server is created with an app profile.
 * The table is static and keyed by AppProfile, so adding a profile without
 * its script is a compile error.
 *
 * - coolify: Docker via the convenience script, then the Coolify installer
 * - wireguard: WireGuard + qrencode, with IPv4/IPv6 forwarding enabled
 * - none: no user data
 */
import type { AppProfile } from "./schema.js";

const COOLIFY = `#cloud-config
package_update: true
packages:
  - curl
runcmd:
  - curl -fsSL https://get.docker.com | sh
  - curl -fsSL https://cdn.coollabs.io/coolify/install.sh | bash
`;

const WIREGUARD = `#cloud-config
package_update: true
packages:
  - wireguard
  - qrencode
runcmd:
  - sysctl -w net.ipv4.ip_forward=1
  - sysctl -w net.ipv6.conf.all.forwarding=1
`;

export const CLOUD_INIT_PROFILES: Readonly<Record<AppProfile, string | null>> = {
  none: null,
  coolify: COOLIFY,
  wireguard: WIREGUARD,
};

export function cloudInitForProfile(profile: AppProfile): string | null {
  return CLOUD_INIT_PROFILES[profile];
}
