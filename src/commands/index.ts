export { init, prepareDockerfile, readDockerfileTemplate, type InitOptions } from "./init.js";
export { open, buildOpenArgs, type OpenOptions } from "./open.js";
export { resume, ERR_NOTHING_TO_RESUME } from "./resume.js";
export { remove, type RemoveOptions } from "./remove.js";
