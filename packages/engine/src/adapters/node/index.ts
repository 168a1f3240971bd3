export { NodeFileHandle, NodeFileSystem } from "./node-filesystem.js";
export { NodeHostIdentity } from "./node-host-identity.js";
export {
  NodeSocketFactory,
  NodeTcpServer,
  NodeTcpSocket,
} from "./node-socket.js";
