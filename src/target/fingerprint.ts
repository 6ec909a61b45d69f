import type { ApplianceLayout } from "../core/models.js";
import type { FileSystemView } from "../fs/view.js";

const NETSCALER_MARKERS = ["/netscaler", "/flash/nsconfig", "/nsconfig", "/var/netscaler"];
const NS_CONF_PATHS = ["/flash/nsconfig/ns.conf", "/nsconfig/ns.conf"];
const NS_CONF_MAX_BYTES = 1024 * 1024;

const VERSION_RE = /^#NS(\d+\.\d+)\s+Build\s+(\d+(?:\.\d+)?)/;
const HOSTNAME_RE = /^set ns hostName\s+"?([^"\s]+)"?/m;

export interface Fingerprint {
  hostname: string | null;
  version: string | null;
  layout: ApplianceLayout;
}

export function parseNsConf(text: string): Pick<Fingerprint, "hostname" | "version"> {
  const versionMatch = VERSION_RE.exec(text);
  const hostnameMatch = HOSTNAME_RE.exec(text);
  return {
    version: versionMatch ? `${versionMatch[1]}-${versionMatch[2]}` : null,
    hostname: hostnameMatch ? hostnameMatch[1] : null,
  };
}

/** Report-header context read from the appliance configuration, best effort. */
export async function fingerprint(view: FileSystemView): Promise<Fingerprint> {
  let layout: ApplianceLayout = "unknown";
  for (const marker of NETSCALER_MARKERS) {
    if (await view.exists(marker)) {
      layout = "citrix-netscaler";
      break;
    }
  }

  for (const path of NS_CONF_PATHS) {
    if (!(await view.exists(path))) continue;
    try {
      const conf = parseNsConf((await view.read(path, NS_CONF_MAX_BYTES)).toString("utf-8"));
      return { ...conf, layout };
    } catch {
      // unreadable config leaves the header fields unknown
      continue;
    }
  }
  return { hostname: null, version: null, layout };
}
