export { createTempDir, removeDir, withTempDir, writeFixture } from "./fs.js";
