export { type ParsedCLI, parseCLIArgs } from "./cli.js";
export {
	DEFAULT_CONFIG_FILE,
	type JSONValue,
	loadClassifierConfig,
	parseClassifierConfig,
} from "./loader.js";
