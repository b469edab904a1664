import QRCode from "qrcode";
import { BuildIOError } from "../shared/errors.js";
import type { BuildWorkspace } from "./workspace.js";

/**
 * Encode the instance id as a QR code PNG at `<workspace>/qr.png`.
 * Returns the written path; the workspace root must already exist.
 */
export async function generateQr(instanceId: string, workspace: BuildWorkspace): Promise<string> {
  try {
    await QRCode.toFile(workspace.qrPath, instanceId, { type: "png", errorCorrectionLevel: "M" });
  } catch (err) {
    throw new BuildIOError("Cannot write QR code", workspace.qrPath, { cause: err });
  }
  return workspace.qrPath;
}
