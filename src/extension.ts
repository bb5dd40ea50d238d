// src/extension.ts
export const BF_EXTENSION = 'bf';

/**
 * True when the text after the last '.' equals `extension` exactly. A name whose
 * only '.' is its first character (".bf") has no extension.
 */
export const validateFileExtension = (filename: string, extension: string = BF_EXTENSION): boolean => {
    const dot = filename.lastIndexOf('.');
    if (dot <= 0) return false;
    return filename.slice(dot + 1) === extension;
};
