/**
 * Test helpers for packdepot
 */

export { createTempPackRoot, removeDir } from "./fs.js";
export {
  buildDescriptorXml,
  buildPackArchive,
  buildRawZip,
  buildChecksumFile,
  writeFixture,
} from "./archive.js";
export type { DescriptorFixture, PackArchiveFixture } from "./archive.js";
