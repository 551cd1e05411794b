import { Inject, Injectable } from '@nestjs/common';
import { HardwareConfig, MONITOR_CONFIG, MonitorConfig } from '../../config/monitor-config';
import { ReadFaultError, toError } from '../../common/errors';
import { ISensorSource } from '../interfaces/sensor-source.interface';
import { ADC_TRANSPORT, AdcTransport } from '../transport/adc-transport';

const ADC_MAX_CODE = 1023;

/**
 * Mcp3008Source - 10-bit, 8-channel ADC on the SPI bus
 *
 * Each read is a single 3-byte transfer: start bit, single-ended channel
 * select, then a padding byte. The 10-bit result spans the low two bits of
 * the second reply byte and the whole third byte.
 */
@Injectable()
export class Mcp3008Source implements ISensorSource {
  readonly name = 'mcp3008';
  private readonly hardware: HardwareConfig;

  constructor(
    @Inject(ADC_TRANSPORT) private readonly transport: AdcTransport,
    @Inject(MONITOR_CONFIG) config: MonitorConfig,
  ) {
    this.hardware = config.hardware;
  }

  async read(channel: number): Promise<number> {
    const source = `${this.name}:ch${channel}`;
    if (!Number.isInteger(channel) || channel < 0 || channel > 7) {
      throw new ReadFaultError(source, `Invalid ADC channel ${channel}`);
    }

    let reply: Buffer;
    try {
      reply = await this.transport.transfer(Buffer.from([1, (8 + channel) << 4, 0]));
    } catch (error) {
      throw new ReadFaultError(source, 'SPI transfer failed', toError(error));
    }
    if (reply.length < 3) {
      throw new ReadFaultError(source, `Short SPI reply (${reply.length} bytes)`);
    }

    const code = ((reply[1] & 0x03) << 8) + reply[2];
    return toVolts(code, this.hardware);
  }
}

/**
 * Convert an ADC code to volts at the input, minus the front end's DC bias.
 */
export function toVolts(code: number, hardware: HardwareConfig): number {
  return (code / ADC_MAX_CODE) * hardware.vref - (hardware.biasVolts ?? 0);
}
