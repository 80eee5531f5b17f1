const MAX_FILE_SIZE = 50 * 1024 * 1024; // 50MB

// Magic bytes for file type detection
const ZIP_MAGIC = [0x50, 0x4b, 0x03, 0x04]; // PK (ZIP archive)

export interface ValidationResult {
    valid: boolean;
    error?: string;
}

/**
 * Validate an EPUB file before it is handed to the archive reader.
 */
export function validateEpubFile(buffer: Uint8Array, filename: string): ValidationResult {
    if (buffer.length === 0) {
        return { valid: false, error: "File is empty." };
    }

    if (buffer.length > MAX_FILE_SIZE) {
        return { valid: false, error: `File too large. Maximum size is ${MAX_FILE_SIZE / 1024 / 1024}MB.` };
    }

    const ext = filename.split(".").pop()?.toLowerCase();
    if (ext !== "epub") {
        return { valid: false, error: `Unsupported file type: .${ext}. Expected .epub.` };
    }

    const header = Array.from(buffer.subarray(0, ZIP_MAGIC.length));
    if (!ZIP_MAGIC.every((byte, i) => header[i] === byte)) {
        return { valid: false, error: "File content is not a ZIP container." };
    }

    return { valid: true };
}
