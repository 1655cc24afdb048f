export { printResult, renderResult } from "./printer.js";
