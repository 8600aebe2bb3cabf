export { definitionSorter, sortDefinitions } from "./sorter.js";
