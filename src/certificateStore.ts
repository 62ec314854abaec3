import fs from "fs";
import path from "path";

import { describeError } from "./errors.js";
import { ClientCertificate } from "./transport.js";

export interface CertificateStore {
  load(deviceId: string): Promise<ClientCertificate | undefined>;
  save(deviceId: string, certificate: ClientCertificate): Promise<void>;
  remove(deviceId: string): Promise<void>;
}

/** PEM files per device: `androidtv_<id>_remote_cert.pem` and `..._key.pem`. */
export class FileCertificateStore implements CertificateStore {
  constructor(private readonly certsPath: string) {}

  certFile(deviceId: string): string {
    return path.join(this.certsPath, `androidtv_${safeName(deviceId)}_remote_cert.pem`);
  }

  keyFile(deviceId: string): string {
    return path.join(this.certsPath, `androidtv_${safeName(deviceId)}_remote_key.pem`);
  }

  async load(deviceId: string): Promise<ClientCertificate | undefined> {
    try {
      const [certPem, keyPem] = await Promise.all([
        fs.promises.readFile(this.certFile(deviceId), "utf-8"),
        fs.promises.readFile(this.keyFile(deviceId), "utf-8")
      ]);
      return { certPem, keyPem };
    } catch (error) {
      if (isMissingFile(error)) {
        return undefined;
      }
      throw error;
    }
  }

  async save(deviceId: string, certificate: ClientCertificate): Promise<void> {
    await fs.promises.mkdir(this.certsPath, { recursive: true });
    await writeAtomic(this.certFile(deviceId), certificate.certPem);
    await writeAtomic(this.keyFile(deviceId), certificate.keyPem);
  }

  async remove(deviceId: string): Promise<void> {
    for (const file of [this.certFile(deviceId), this.keyFile(deviceId)]) {
      try {
        await fs.promises.unlink(file);
      } catch (error) {
        if (!isMissingFile(error)) {
          console.error(`[Certificates] Failed to remove ${path.basename(file)}: ${describeError(error)}`);
        }
      }
    }
  }
}

function safeName(deviceId: string): string {
  return deviceId.replace(/[^A-Za-z0-9_.-]/g, "_");
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function writeAtomic(file: string, contents: string): Promise<void> {
  const temp = `${file}.tmp`;
  await fs.promises.writeFile(temp, contents, { encoding: "utf-8", mode: 0o600 });
  await fs.promises.rename(temp, file);
}
