export { createRng, createScriptedRng, type Rng } from "./rng.js";
export { assert, describe, test } from "./nodeTest.js";
