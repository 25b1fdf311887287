import type { UploadedImage } from "@/lib/analysis-types";
import { ApiError } from "@/lib/api-errors";
import type { ServerConfig } from "@/lib/config";

export const UPLOAD_FIELD = "file";

type IntakeLimits = Pick<ServerConfig, "allowedFileTypes" | "maxFileSizeBytes" | "maxFileSizeMb">;

type ImageSignature = {
  format: "jpeg" | "png" | "webp";
  matches: (bytes: Uint8Array) => boolean;
};

const startsWith = (bytes: Uint8Array, prefix: number[], offset = 0) =>
  bytes.length >= offset + prefix.length &&
  prefix.every((value, index) => bytes[offset + index] === value);

const asciiBytes = (value: string) => Array.from(value, (char) => char.charCodeAt(0));

const IMAGE_SIGNATURES: ImageSignature[] = [
  { format: "jpeg", matches: (bytes) => startsWith(bytes, [0xff, 0xd8, 0xff]) },
  {
    format: "png",
    matches: (bytes) => startsWith(bytes, [0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a]),
  },
  {
    format: "webp",
    matches: (bytes) =>
      startsWith(bytes, asciiBytes("RIFF")) && startsWith(bytes, asciiBytes("WEBP"), 8),
  },
];

export const detectImageFormat = (bytes: Uint8Array) =>
  IMAGE_SIGNATURES.find((signature) => signature.matches(bytes))?.format ?? null;

// Allowance for multipart boundaries and part headers on top of the file itself.
const MULTIPART_OVERHEAD_BYTES = 64 * 1024;

export const readUploadForm = async (
  request: Pick<Request, "headers" | "formData">,
  limits: Pick<IntakeLimits, "maxFileSizeBytes" | "maxFileSizeMb">
) => {
  const declaredLength = Number.parseInt(request.headers.get("content-length") ?? "", 10);
  if (declaredLength > limits.maxFileSizeBytes + MULTIPART_OVERHEAD_BYTES) {
    throw new ApiError(400, `File too large. Maximum size: ${limits.maxFileSizeMb}MB`);
  }

  try {
    return await request.formData();
  } catch (error) {
    throw new ApiError(400, "Invalid request format", { cause: error });
  }
};

/**
 * Pulls the uploaded image out of the form and applies the intake rules.
 * The size check runs before the type check so an oversized upload is
 * always reported as too large.
 */
export const validateUpload = async (
  form: FormData,
  limits: IntakeLimits
): Promise<UploadedImage> => {
  const entry = form.get(UPLOAD_FIELD);
  if (entry === null || typeof entry === "string") {
    throw new ApiError(400, "No file provided");
  }

  if (entry.size > limits.maxFileSizeBytes) {
    throw new ApiError(400, `File too large. Maximum size: ${limits.maxFileSizeMb}MB`);
  }

  const mimeType = entry.type.toLowerCase();
  if (!limits.allowedFileTypes.includes(mimeType)) {
    throw new ApiError(
      400,
      `Unsupported file type. Allowed types: ${limits.allowedFileTypes.join(", ")}`
    );
  }

  let bytes: Uint8Array;
  try {
    bytes = new Uint8Array(await entry.arrayBuffer());
  } catch (error) {
    throw new ApiError(400, "Failed to read uploaded file", { cause: error });
  }

  if (bytes.byteLength === 0) {
    throw new ApiError(400, "Empty file provided");
  }

  if (bytes.byteLength > limits.maxFileSizeBytes) {
    throw new ApiError(400, `File too large. Maximum size: ${limits.maxFileSizeMb}MB`);
  }

  if (!detectImageFormat(bytes)) {
    throw new ApiError(400, "Uploaded file is not a valid image");
  }

  return {
    bytes,
    mimeType,
    fileName: entry.name || undefined,
  };
};
