import * as os from "node:os";
import type { IHostIdentity } from "../../interfaces/host-identity.js";

export class NodeHostIdentity implements IHostIdentity {
  userName(): string {
    try {
      return os.userInfo().username;
    } catch {
      // No passwd entry for the uid (common in containers)
      return process.env.USER ?? process.env.USERNAME ?? "unknown";
    }
  }

  hostAddress(): string {
    return `${os.hostname()}/${firstExternalIPv4() ?? "127.0.0.1"}`;
  }
}

function firstExternalIPv4(): string | null {
  for (const addresses of Object.values(os.networkInterfaces())) {
    for (const addr of addresses ?? []) {
      if (addr.family === "IPv4" && !addr.internal) {
        return addr.address;
      }
    }
  }
  return null;
}
