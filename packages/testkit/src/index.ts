export { DEFAULT_EPSILON, assert, describe, test } from "./nodeTest.js";
