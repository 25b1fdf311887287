import { detectImageFormat, readUploadForm, validateUpload } from "@/lib/image-intake";

const JPEG_BYTES = new Uint8Array([0xff, 0xd8, 0xff, 0xe0, 0x00, 0x10, 0x4a, 0x46]);
const PNG_BYTES = new Uint8Array([0x89, 0x50, 0x4e, 0x47, 0x0d, 0x0a, 0x1a, 0x0a, 0x00]);
const WEBP_BYTES = new TextEncoder().encode("RIFF\u0000\u0000\u0000\u0000WEBPVP8 ");

const limits = {
  allowedFileTypes: ["image/jpeg", "image/png", "image/webp"],
  maxFileSizeBytes: 16,
  maxFileSizeMb: 1,
};

const buildForm = (file: File | string | null) => {
  const form = new FormData();
  if (file !== null) {
    form.set("file", file);
  }
  return form;
};

describe("detectImageFormat", () => {
  it("recognises jpeg, png and webp signatures", () => {
    expect(detectImageFormat(JPEG_BYTES)).toBe("jpeg");
    expect(detectImageFormat(PNG_BYTES)).toBe("png");
    expect(detectImageFormat(WEBP_BYTES)).toBe("webp");
    expect(detectImageFormat(new TextEncoder().encode("%PDF-1.7"))).toBeNull();
  });
});

describe("validateUpload", () => {
  it("returns the image bytes for a valid jpeg", async () => {
    const form = buildForm(new File([JPEG_BYTES], "photo.jpg", { type: "image/jpeg" }));

    const image = await validateUpload(form, limits);

    expect(image.mimeType).toBe("image/jpeg");
    expect(image.fileName).toBe("photo.jpg");
    expect(Array.from(image.bytes)).toEqual(Array.from(JPEG_BYTES));
  });

  it("rejects a missing or non-file field", async () => {
    await expect(validateUpload(buildForm(null), limits)).rejects.toMatchObject({
      status: 400,
      message: "No file provided",
    });
    await expect(validateUpload(buildForm("not a file"), limits)).rejects.toMatchObject({
      status: 400,
      message: "No file provided",
    });
  });

  it("rejects oversized files regardless of content type", async () => {
    const big = new Uint8Array(32);
    big.set(JPEG_BYTES);

    for (const type of ["image/jpeg", "application/pdf"]) {
      const form = buildForm(new File([big], "big", { type }));
      await expect(validateUpload(form, limits)).rejects.toMatchObject({
        status: 400,
        message: "File too large. Maximum size: 1MB",
      });
    }
  });

  it("rejects disallowed content types", async () => {
    const form = buildForm(new File(["%PDF-1.7"], "menu.pdf", { type: "application/pdf" }));

    await expect(validateUpload(form, limits)).rejects.toMatchObject({
      status: 400,
      message: "Unsupported file type. Allowed types: image/jpeg, image/png, image/webp",
    });
  });

  it("rejects empty files and bytes that are not an image", async () => {
    await expect(
      validateUpload(buildForm(new File([], "empty.jpg", { type: "image/jpeg" })), limits)
    ).rejects.toMatchObject({ status: 400, message: "Empty file provided" });

    await expect(
      validateUpload(buildForm(new File(["hello"], "fake.jpg", { type: "image/jpeg" })), limits)
    ).rejects.toMatchObject({ status: 400, message: "Uploaded file is not a valid image" });
  });
});

describe("readUploadForm", () => {
  it("reports a 400 when the body is not form data", async () => {
    const request = new Request("http://localhost/analyze", {
      method: "POST",
      headers: { "content-type": "text/plain" },
      body: "plain text",
    });

    await expect(readUploadForm(request, limits)).rejects.toMatchObject({
      status: 400,
      message: "Invalid request format",
    });
  });

  it("rejects an oversized declared length without reading the body", async () => {
    const formData = vi.fn<() => Promise<FormData>>();
    const request = {
      headers: new Headers({ "content-length": String(16 + 64 * 1024 + 1) }),
      formData,
    };

    await expect(readUploadForm(request, limits)).rejects.toMatchObject({
      status: 400,
      message: "File too large. Maximum size: 1MB",
    });
    expect(formData).not.toHaveBeenCalled();
  });

  it("reads bodies whose declared length fits within the multipart allowance", async () => {
    const form = buildForm(new File([JPEG_BYTES], "photo.jpg", { type: "image/jpeg" }));
    const request = {
      headers: new Headers({ "content-length": String(16 + 64 * 1024) }),
      formData: vi.fn<() => Promise<FormData>>().mockResolvedValue(form),
    };

    await expect(readUploadForm(request, limits)).resolves.toBe(form);
  });
});
