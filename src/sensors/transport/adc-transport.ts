import { Logger } from '@nestjs/common';
import type { SpiDevice } from 'spi-device';
import { HardwareConfig } from '../../config/monitor-config';

export const ADC_TRANSPORT = Symbol('ADC_TRANSPORT');

/**
 * Full-duplex byte transport to the ADC chip.
 */
export interface AdcTransport {
  transfer(send: Buffer): Promise<Buffer>;
  close(): Promise<void>;
}

/**
 * SPI transport backed by the `spi-device` package. The bus is opened on the
 * first transfer, so installations without hardware never load the driver.
 */
export class SpiAdcTransport implements AdcTransport {
  private readonly logger = new Logger(SpiAdcTransport.name);
  private device: Promise<SpiDevice> | null = null;

  constructor(private readonly hardware: HardwareConfig) {}

  async transfer(send: Buffer): Promise<Buffer> {
    const device = await this.open();
    const receive = Buffer.alloc(send.length);
    await new Promise<void>((resolve, reject) => {
      device.transfer(
        [
          {
            sendBuffer: send,
            receiveBuffer: receive,
            byteLength: send.length,
            speedHz: this.hardware.speedHz,
          },
        ],
        (error) => (error ? reject(error) : resolve()),
      );
    });
    return receive;
  }

  async close(): Promise<void> {
    if (!this.device) return;
    const device = await this.device;
    this.device = null;
    await new Promise<void>((resolve, reject) => {
      device.close((error) => (error ? reject(error) : resolve()));
    });
    this.logger.log('SPI bus closed');
  }

  private open(): Promise<SpiDevice> {
    if (!this.device) {
      const { spiBus, spiDevice, speedHz } = this.hardware;
      this.device = import('spi-device').then(
        (spi) =>
          new Promise<SpiDevice>((resolve, reject) => {
            const handle = spi.open(
              spiBus,
              spiDevice,
              { maxSpeedHz: speedHz },
              (error) => (error ? reject(error) : resolve(handle)),
            );
          }),
      );
      // A failed open is retried on the next transfer
      void this.device.catch(() => {
        this.device = null;
      });
      this.logger.log(`Opening SPI bus ${spiBus}.${spiDevice} at ${speedHz}Hz`);
    }
    return this.device;
  }
}
