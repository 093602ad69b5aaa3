export interface DecodedDataUrl {
  mimeType: string;
  bytes: Uint8Array;
}

const DATA_URL_REGEX = /^data:([^;,]*)((?:;[^;,]*)*?),(.*)$/s;

export function decodeDataUrl(dataUrl: string): DecodedDataUrl {
  const match = DATA_URL_REGEX.exec(dataUrl.trim());
  if (!match) {
    throw new Error("Not a data URL.");
  }

  const mimeType = match[1] || "text/plain";
  const isBase64 = match[2].split(";").includes("base64");
  const payload = match[3];

  if (!isBase64) {
    return { mimeType, bytes: new TextEncoder().encode(decodeURIComponent(payload)) };
  }

  const binary = atob(payload);
  const bytes = new Uint8Array(binary.length);
  for (let index = 0; index < binary.length; index += 1) {
    bytes[index] = binary.charCodeAt(index);
  }

  return { mimeType, bytes };
}

/** Camera screenshots arrive as data URLs; the API takes them as regular file uploads. */
export function dataUrlToFile(dataUrl: string, baseName: string): File {
  const { mimeType, bytes } = decodeDataUrl(dataUrl);
  const extension = mimeType.split("/")[1] ?? "bin";
  return new File([bytes.slice()], `${baseName}.${extension}`, { type: mimeType });
}
