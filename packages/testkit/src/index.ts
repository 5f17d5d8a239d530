export { createRng, nextInt, withSeed, type Rng } from "./rng.js";
export { approxDeepEqual, approxEqual, type ApproxOptions } from "./approx.js";
export { assert, describe, test } from "./nodeTest.js";
