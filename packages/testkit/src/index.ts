export { createRng, type Rng } from "./rng.js";
export { assertBytesEqual, hexdump } from "./golden.js";
export { assert, describe, test } from "./nodeTest.js";
