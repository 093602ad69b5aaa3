import { describe, expect, it } from "vitest";
import { describeCameraError } from "@/lib/camera";

describe("describeCameraError", () => {
  it("explains a denied permission", () => {
    expect(describeCameraError(new DOMException("Permission denied", "NotAllowedError"))).toBe(
      "Camera permission denied. Allow camera access and try again."
    );
  });

  it("explains a missing camera", () => {
    expect(describeCameraError(new DOMException("Requested device not found", "NotFoundError"))).toBe("No camera found on this device.");
  });

  it("passes through other messages", () => {
    expect(describeCameraError(new DOMException("Constraints could not be satisfied", "OverconstrainedError"))).toBe(
      "Constraints could not be satisfied"
    );
    expect(describeCameraError("getUserMedia is not implemented in this browser")).toBe("getUserMedia is not implemented in this browser");
  });
});
