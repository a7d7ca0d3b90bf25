import dgram from "node:dgram";

/** Create and bind the UDP socket the game sends telemetry to */
export function createUdpSocket(
  host: string,
  port: number,
  onMessage: (msg: Buffer, rinfo: dgram.RemoteInfo) => void,
): dgram.Socket {
  const socket = dgram.createSocket({ type: "udp4", reuseAddr: true });

  socket.on("message", onMessage);
  socket.on("error", (err) => {
    console.error(`[UDP] Socket error: ${err.message}`);
  });

  socket.bind(port, host, () => {
    console.log(`[UDP] Listening on ${host}:${port}`);
  });

  return socket;
}
