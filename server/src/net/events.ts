export const SOCKET_EVENT = "msg";
export const SOCKET_PATH = "/ws";
