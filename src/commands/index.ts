export {
	type ConfigInitOptions,
	configInit,
	configShow,
} from "./config/index";
export { type UpdateCommandOptions, update } from "./update";
