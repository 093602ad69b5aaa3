"use client";

import { useCallback, useRef, useState } from "react";
import Webcam from "react-webcam";
import { describeCameraError } from "@/lib/camera";

const videoConstraints = {
  width: { ideal: 1280 },
  height: { ideal: 720 },
  facingMode: "environment"
};

interface CameraCaptureProps {
  disabled?: boolean;
  onCapture: (dataUrl: string) => void;
}

export default function CameraCapture({ disabled = false, onCapture }: CameraCaptureProps) {
  const webcamRef = useRef<Webcam>(null);
  const [ready, setReady] = useState(false);
  const [cameraError, setCameraError] = useState<string>("");

  const capture = useCallback(() => {
    const screenshot = webcamRef.current?.getScreenshot();
    if (screenshot) {
      onCapture(screenshot);
    }
  }, [onCapture]);

  const onUserMediaError = useCallback((error: string | DOMException) => {
    console.error(`[camera] ${typeof error === "string" ? error : error.name}`);
    setCameraError(describeCameraError(error));
  }, []);

  if (cameraError) {
    return <p className="error-banner">Camera unavailable: {cameraError}</p>;
  }

  return (
    <div className="camera-shell">
      <Webcam
        ref={webcamRef}
        audio={false}
        mirrored={false}
        className="camera-feed"
        screenshotFormat="image/jpeg"
        screenshotQuality={0.92}
        videoConstraints={videoConstraints}
        onUserMedia={() => setReady(true)}
        onUserMediaError={onUserMediaError}
      />
      <button type="button" onClick={capture} disabled={disabled || !ready}>
        Take picture
      </button>
    </div>
  );
}
