export {
  TEST_KEY_HEX,
  createTempStoreRoot,
  removeDir,
  withTempStore,
} from "./fs.js";
