import { IndexBuilder } from "../indexBuilder.js";
import type { IndexData } from "../../indexFormat.js";

/** cat/dog/bird corpus: 0 = {cat, dog}, 1 = {dog}, 2 = {bird}. */
export function buildPets(urls?: readonly string[]): IndexData {
  const b = new IndexBuilder();
  b.add(0, "cat");
  b.add(0, "dog");
  b.add(1, "dog");
  b.add(2, "bird");
  return b.build({ urls });
}
