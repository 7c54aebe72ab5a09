export { MeshService } from "./mesh-service.js";
export type { MeshServiceDependencies, MeshServiceStatus } from "./mesh-service.js";
