export { hashDirectory, md5File, manifestKey, resolveManifestKey } from './manifest.js';
export type { FileManifest } from './manifest.js';
export { createArchive, extractArchive } from './archive.js';
