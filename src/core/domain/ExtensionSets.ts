export const IMAGE_EXTENSIONS: ReadonlyArray<string> = [
  ".jpg", ".jpeg", ".png", ".gif", ".bmp", ".tiff", ".ico", ".webp",
];

export const VIDEO_EXTENSIONS: ReadonlyArray<string> = [
  ".mp4", ".avi", ".mov", ".wmv", ".flv", ".mpeg", ".mpg", ".m4v", ".mkv",
];

export const AUDIO_EXTENSIONS: ReadonlyArray<string> = [
  ".mp3", ".wav", ".ogg", ".m4a", ".flac", ".aac", ".wma", ".m4b", ".m4p",
];

export const DOCUMENT_EXTENSIONS: ReadonlyArray<string> = [
  ".pdf", ".doc", ".docx", ".txt", ".rtf", ".odt", ".xls", ".xlsx", ".ppt", ".pptx",
];

// Copies, so callers can extend their list without touching the shared constant.
export const imageExtensions = (): string[] => [...IMAGE_EXTENSIONS];
export const videoExtensions = (): string[] => [...VIDEO_EXTENSIONS];
export const audioExtensions = (): string[] => [...AUDIO_EXTENSIONS];
export const documentExtensions = (): string[] => [...DOCUMENT_EXTENSIONS];

export const hasExtension = (name: string, extensions: ReadonlyArray<string>): boolean => {
  const lower = name.toLowerCase();
  return extensions.some((ext) => lower.endsWith(ext.toLowerCase()));
};
