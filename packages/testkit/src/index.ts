export { createRng, type Rng } from "./rng.js";
export { readFixture, readJsonFixture } from "./fixtures.js";
export { assert, beforeEach, describe, test } from "./nodeTest.js";
