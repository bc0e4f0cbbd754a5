/**
 * Pipeline modules export
 */

export { split } from "./splitter";
export { styles } from "./styles";
export { process } from "./processor";
export { images } from "./images";
export { indexer } from "./indexer";
export { stats } from "./stats";
