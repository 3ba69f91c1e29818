import ModbusRTU from "modbus-serial";
import type { Logger } from "pino";
import type { RegisterKind } from "../../devices/types";

export interface ModbusTcpConfig {
  host: string;
  port: number;
  unitId: number;
  timeoutMs?: number;
}

export const CLOSE_TIMEOUT_MS = 1000;

export class ModbusTcpClient {
  private client = new ModbusRTU();
  private connected = false;
  private connecting: Promise<void> | null = null;

  constructor(
    private readonly cfg: ModbusTcpConfig,
    private readonly logger: Logger,
  ) {
    this.client.setTimeout(cfg.timeoutMs ?? 2000);
  }

  async connect(): Promise<void> {
    // devices sharing a gateway may ask at the same time
    if (!this.connecting) {
      this.connecting = this.openConnection().finally(() => {
        this.connecting = null;
      });
    }
    return this.connecting;
  }

  private async openConnection(): Promise<void> {
    await this.safeDisconnect();
    this.logger.info({ host: this.cfg.host, port: this.cfg.port }, "Connecting Modbus TCP");
    try {
      await this.client.connectTCP(this.cfg.host, { port: this.cfg.port });
      this.client.setID(this.cfg.unitId);
    } catch (err) {
      this.logger.warn({ err, host: this.cfg.host }, "Modbus TCP connect failed");
      throw err;
    }
    this.connected = true;
    this.logger.info({ unitId: this.cfg.unitId }, "Modbus TCP connected");
  }

  async safeDisconnect(): Promise<void> {
    if (!this.connected) return;
    this.connected = false;
    // modbus-serial only calls back from the socket's close event, which has already fired when the peer hung up
    if (!this.client.isOpen) {
      this.logger.info({ host: this.cfg.host }, "Modbus TCP connection was closed by the device");
      return;
    }
    await new Promise<void>((resolve) => {
      const timer = setTimeout(() => {
        this.logger.warn({ host: this.cfg.host }, "Modbus TCP close did not complete, continuing");
        resolve();
      }, CLOSE_TIMEOUT_MS);
      try {
        this.client.close(() => {
          clearTimeout(timer);
          this.logger.info({ host: this.cfg.host }, "Modbus TCP disconnected");
          resolve();
        });
      } catch (err) {
        clearTimeout(timer);
        this.logger.warn({ err }, "Modbus TCP disconnect error");
        resolve();
      }
    });
  }

  isConnected(): boolean {
    return this.connected && this.client.isOpen;
  }

  async read(kind: RegisterKind, start: number, length: number): Promise<number[]> {
    return kind === "input" ? this.readInput(start, length) : this.readHolding(start, length);
  }

  async readHolding(start: number, length: number): Promise<number[]> {
    const res = await this.client.readHoldingRegisters(start, length);
    return Array.from(res.data);
  }

  async readInput(start: number, length: number): Promise<number[]> {
    const res = await this.client.readInputRegisters(start, length);
    return Array.from(res.data);
  }
}

const clientCache = new Map<string, ModbusTcpClient>();

export function getSharedModbusClient(cfg: ModbusTcpConfig, logger: Logger): ModbusTcpClient {
  const key = `${cfg.host}:${cfg.port}:${cfg.unitId}`;
  let client = clientCache.get(key);
  if (!client) {
    client = new ModbusTcpClient(cfg, logger);
    clientCache.set(key, client);
  }
  return client;
}

export async function closeSharedModbusClients(): Promise<void> {
  const clients = [...clientCache.values()];
  clientCache.clear();
  await Promise.all(clients.map((client) => client.safeDisconnect()));
}
