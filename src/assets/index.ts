export { addResumeToVault, computeSha256 } from "./vault";
