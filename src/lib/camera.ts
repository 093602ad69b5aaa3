/** Turns a react-webcam `onUserMediaError` payload into a message for the camera panel. */
export function describeCameraError(error: string | DOMException): string {
  if (typeof error === "string") {
    return error;
  }
  if (error.name === "NotAllowedError") {
    return "Camera permission denied. Allow camera access and try again.";
  }
  if (error.name === "NotFoundError") {
    return "No camera found on this device.";
  }
  if (error.name === "NotReadableError") {
    return "The camera is in use by another application.";
  }

  return error.message || error.name;
}
