/**
 * ISensorSource - Strategy Pattern for load sampling
 *
 * One implementation per kind of front end. The collector and the calibrator
 * only depend on this contract, so a device can move between real hardware
 * and the appliance simulator through configuration alone.
 */
export interface ISensorSource {
  /**
   * Identifier of the implementation, used in log lines.
   * Examples: 'mcp3008', 'simulated'
   */
  readonly name: string;

  /**
   * Take one sample from the given ADC channel.
   *
   * @returns the raw value in the sensor's native unit (volts at the ADC input)
   * @throws ReadFaultError when the sensor or its transport fails
   * @throws ReadTimeoutError when the sensor does not answer in time
   */
  read(channel: number): Promise<number>;
}
