/**
 * Line framing over a duplex stream; a PassThrough stands in for the socket.
 * The datagram adapter is exercised against a UDP socket bound to loopback.
 */
import dgram from "node:dgram";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, test } from "vitest";

import { tick } from "../../__tests__/fakes.js";
import { createLineConnection, openDatagramSocket } from "../connection.js";

function createSocket() {
  const socket = new PassThrough();
  const written: string[] = [];
  socket.on("data", (chunk: Buffer) => written.push(chunk.toString("utf8")));
  return { socket, written };
}

describe("createLineConnection", () => {
  test("joins chunks into CRLF terminated lines", async () => {
    // Arrange
    const socket = new PassThrough();
    const connection = createLineConnection(socket);

    // Act
    socket.emit("data", Buffer.from("SOU"));
    socket.emit("data", Buffer.from("RCE 3\r\nVOLUME 40\n"));

    // Assert
    await expect(connection.readLine(1000)).resolves.toBe("SOURCE 3");
    await expect(connection.readLine(1000)).resolves.toBe("VOLUME 40");
  });

  test("resolves a pending read when a line arrives", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);

    const read = connection.readLine(1000);
    socket.emit("data", "OK\r\n");

    await expect(read).resolves.toBe("OK");
  });

  test("rejects with a TimeoutError when no line arrives", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);

    const read = connection.readLine(10);

    await expect(read).rejects.toMatchObject({
      name: "TimeoutError",
      message: "No reply within 10ms",
    });
  });

  test("discards buffered lines", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);
    socket.emit("data", "STALE 1\r\nSTALE 2\r\n");

    expect(connection.discardBuffered()).toBe(2);

    const read = connection.readLine(1000);
    socket.emit("data", "FRESH\r\n");
    await expect(read).resolves.toBe("FRESH");
  });

  test("writes through to the socket", async () => {
    const { socket, written } = createSocket();
    const connection = createLineConnection(socket);

    await connection.write("POWERON 1\r\n");
    await tick();

    expect(written).toEqual(["POWERON 1\r\n"]);
  });

  test("rejects a pending read when the socket errors", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);

    const read = connection.readLine(1000);
    socket.emit("error", new Error("ECONNRESET"));

    await expect(read).rejects.toThrow("ECONNRESET");
    await expect(connection.write("GETVOL 1\r\n")).rejects.toThrow(
      "ECONNRESET",
    );
  });

  test("reports closed once the peer ends the stream", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);
    expect(connection.isOpen()).toBe(true);

    socket.emit("end");

    expect(connection.isOpen()).toBe(false);
    await expect(connection.write("GETVOL 1\r\n")).rejects.toThrow(
      "Connection closed by peer",
    );
  });

  test("close rejects a pending read", async () => {
    const socket = new PassThrough();
    const connection = createLineConnection(socket);

    const read = connection.readLine(1000);
    await connection.close();

    await expect(read).rejects.toThrow("Connection closed");
    expect(socket.destroyed).toBe(true);
  });
});

describe("openDatagramSocket", () => {
  let device: dgram.Socket;
  let port = 0;

  beforeEach(async () => {
    device = dgram.createSocket("udp4");
    await new Promise<void>((resolve) => device.bind(0, "127.0.0.1", resolve));
    port = device.address().port;
  });

  afterEach(async () => {
    await new Promise<void>((resolve) => device.close(() => resolve()));
  });

  test("receives the reply sent back to the command's source port", async () => {
    // Arrange
    device.on("message", (message, rinfo) => {
      device.send(`ACK ${message.toString("ascii")}`, rinfo.port, rinfo.address);
    });
    const socket = await openDatagramSocket({ host: "127.0.0.1", port });

    // Act
    await socket.send("c4.amp.out 01 01");
    const reply = await socket.receive(1000);
    socket.close();

    // Assert
    expect(reply).toBe("ACK c4.amp.out 01 01");
  });

  test("keeps replies that arrive before they are read, in order", async () => {
    device.on("message", (_message, rinfo) => {
      device.send("FIRST", rinfo.port, rinfo.address);
      device.send("SECOND", rinfo.port, rinfo.address);
    });
    const socket = await openDatagramSocket({ host: "127.0.0.1", port });

    await socket.send("c4.amp.chvol 01 b2");
    const first = await socket.receive(1000);
    const second = await socket.receive(1000);
    socket.close();

    expect([first, second]).toEqual(["FIRST", "SECOND"]);
  });

  test("resolves null when the device stays silent", async () => {
    const socket = await openDatagramSocket({ host: "127.0.0.1", port });

    await socket.send("c4.amp.out 02 00");
    const reply = await socket.receive(20);
    socket.close();

    expect(reply).toBeNull();
  });

  test("close wakes a pending receive with null", async () => {
    const socket = await openDatagramSocket({ host: "127.0.0.1", port });
    await socket.send("c4.amp.out 03 01");

    const pending = socket.receive(5000);
    socket.close();

    await expect(pending).resolves.toBeNull();
  });
});
