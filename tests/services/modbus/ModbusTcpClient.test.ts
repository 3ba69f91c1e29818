import { afterEach, beforeEach, describe, expect, test, vi } from "vitest";
import {
  CLOSE_TIMEOUT_MS,
  ModbusTcpClient,
  closeSharedModbusClients,
  getSharedModbusClient,
} from "../../../src/services/modbus/ModbusTcpClient";
import { ModbusRegisterWindow } from "../../../src/services/registerWindow";
import { silentLogger } from "../../helpers/fakes";

const mocks = vi.hoisted(() => {
  const instances: FakeModbusRTU[] = [];

  class FakeModbusRTU {
    isOpen = false;
    setTimeout = vi.fn();
    setID = vi.fn();
    connectTCP = vi.fn(async (_host: string, _options: { port: number }) => {
      this.isOpen = true;
    });
    close = vi.fn((callback: () => void) => {
      this.isOpen = false;
      callback();
    });
    readInputRegisters = vi.fn(async (start: number, length: number) => ({
      data: Array.from({ length }, (_, i) => start + i),
    }));
    readHoldingRegisters = vi.fn(async (_start: number, length: number) => ({
      data: new Array<number>(length).fill(7),
    }));

    constructor() {
      instances.push(this);
    }
  }

  return { FakeModbusRTU, instances };
});

vi.mock("modbus-serial", () => ({ default: mocks.FakeModbusRTU }));

const CFG = { host: "10.0.0.7", port: 502, unitId: 3, timeoutMs: 1500 };

function lastInstance() {
  const instance = mocks.instances[mocks.instances.length - 1];
  if (!instance) {
    throw new Error("no modbus instance created");
  }
  return instance;
}

describe("ModbusTcpClient", () => {
  beforeEach(() => {
    mocks.instances.length = 0;
  });

  afterEach(() => {
    vi.useRealTimers();
  });

  test("connects to the configured host and selects the unit id", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    const rtu = lastInstance();

    await client.connect();

    expect(rtu.setTimeout).toHaveBeenCalledWith(1500);
    expect(rtu.connectTCP).toHaveBeenCalledWith("10.0.0.7", { port: 502 });
    expect(rtu.setID).toHaveBeenCalledWith(3);
    expect(client.isConnected()).toBe(true);
  });

  test("simultaneous connects open one socket", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);

    await Promise.all([client.connect(), client.connect()]);

    expect(lastInstance().connectTCP).toHaveBeenCalledTimes(1);
  });

  test("a refused connection rejects and leaves the client disconnected", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    lastInstance().connectTCP.mockRejectedValueOnce(new Error("ECONNREFUSED"));

    await expect(client.connect()).rejects.toThrow("ECONNREFUSED");
    expect(client.isConnected()).toBe(false);
  });

  test("read dispatches on the register kind", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    await client.connect();

    await expect(client.read("input", 10, 3)).resolves.toEqual([10, 11, 12]);
    await expect(client.read("holding", 0, 2)).resolves.toEqual([7, 7]);
    expect(lastInstance().readInputRegisters).toHaveBeenCalledWith(10, 3);
    expect(lastInstance().readHoldingRegisters).toHaveBeenCalledWith(0, 2);
  });

  test("safeDisconnect closes an open connection", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    await client.connect();

    await client.safeDisconnect();

    expect(lastInstance().close).toHaveBeenCalledTimes(1);
    expect(client.isConnected()).toBe(false);
  });

  test("reconnects after the device closed the session", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    const rtu = lastInstance();
    await client.connect();

    // the socket's close event has fired already, so close() would never call back
    rtu.isOpen = false;
    rtu.close.mockImplementation(() => {});
    expect(client.isConnected()).toBe(false);

    await client.connect();

    expect(rtu.close).not.toHaveBeenCalled();
    expect(rtu.connectTCP).toHaveBeenCalledTimes(2);
    expect(client.isConnected()).toBe(true);
  });

  test("safeDisconnect stops waiting on a close that never completes", async () => {
    vi.useFakeTimers();
    const client = new ModbusTcpClient(CFG, silentLogger);
    const rtu = lastInstance();
    await client.connect();
    rtu.close.mockImplementationOnce(() => {});

    let settled = false;
    const closing = client.safeDisconnect().then(() => {
      settled = true;
    });

    await vi.advanceTimersByTimeAsync(CLOSE_TIMEOUT_MS - 1);
    expect(settled).toBe(false);

    await vi.advanceTimersByTimeAsync(1);
    await closing;
    expect(settled).toBe(true);
    expect(rtu.close).toHaveBeenCalledTimes(1);
    expect(client.isConnected()).toBe(false);
  });

  test("a register window recovers on the next poll after the device hangs up", async () => {
    const client = new ModbusTcpClient(CFG, silentLogger);
    const rtu = lastInstance();
    const window = new ModbusRegisterWindow(client, { kind: "input", start: 0, count: 3 }, 500, silentLogger);

    await window.poll();
    expect(window.available).toBe(true);

    rtu.isOpen = false;
    rtu.close.mockImplementation(() => {});

    await window.poll();
    expect(window.available).toBe(true);
    expect(window.registers).toEqual([0, 1, 2]);
    expect(rtu.connectTCP).toHaveBeenCalledTimes(2);
  });
});

describe("getSharedModbusClient", () => {
  test("devices behind one gateway and unit share a client", async () => {
    const first = getSharedModbusClient(CFG, silentLogger);
    const second = getSharedModbusClient({ ...CFG }, silentLogger);
    const other = getSharedModbusClient({ ...CFG, unitId: 4 }, silentLogger);

    expect(second).toBe(first);
    expect(other).not.toBe(first);

    await closeSharedModbusClients();
    expect(getSharedModbusClient(CFG, silentLogger)).not.toBe(first);
  });
});
