import { Test, TestingModule } from '@nestjs/testing';
import { CalibrationError, ReadFaultError } from '../common/errors';
import { MONITOR_CONFIG, MonitorEnv } from '../config/monitor-config';
import { DeviceRegistryService } from '../devices/device-registry.service';
import { SensorSourceRegistry } from '../sensors/sensor-source.registry';
import { buildTestConfig } from '../test-utils';
import { CalibrationService } from './calibration.service';

describe('CalibrationService', () => {
  let service: CalibrationService;
  let registry: DeviceRegistryService;
  let mockSource: { name: string; read: jest.Mock };

  async function setup(env: MonitorEnv = {}): Promise<void> {
    mockSource = { name: 'stub', read: jest.fn() };

    const module: TestingModule = await Test.createTestingModule({
      providers: [
        CalibrationService,
        DeviceRegistryService,
        {
          provide: SensorSourceRegistry,
          useValue: { sourceFor: jest.fn(() => mockSource) },
        },
        {
          provide: MONITOR_CONFIG,
          useValue: buildTestConfig(
            {
              bench: {},
              mains: { ctRatio: 2000, voltage: 120 },
            },
            env,
          ),
        },
      ],
    }).compile();

    service = module.get<CalibrationService>(CalibrationService);
    registry = module.get<DeviceRegistryService>(DeviceRegistryService);
  }

  beforeEach(async () => {
    await setup();
  });

  afterEach(() => {
    jest.clearAllMocks();
  });

  it('should derive the factor from a known load (mean 2.0 against 200 W)', async () => {
    mockSource.read.mockResolvedValue(2.0);

    const result = await service.calibrate('bench', 200);

    expect(result.factor).toBe(100);
    expect(result.samples).toBe(10);
    expect(result.previousFactor).toBe(1);
    expect(mockSource.read).toHaveBeenCalledTimes(10);
    expect(registry.get('bench').calibrationFactor).toBe(100);
  });

  it('should account for the CT ratio and voltage', async () => {
    mockSource.read.mockResolvedValue(0.001);

    const result = await service.calibrate('mains', 480);

    // 0.001 * 2000 * 120 = 240 W nominal
    expect(result.factor).toBeCloseTo(2, 9);
  });

  it('should average fluctuating samples', async () => {
    [1, 3, 2, 2, 1, 3, 2, 2, 1, 3].forEach((value) => mockSource.read.mockResolvedValueOnce(value));

    const result = await service.calibrate('bench', 100);

    expect(result.meanRaw).toBe(2);
    expect(result.factor).toBe(50);
  });

  it('should fail on a flat-zero signal and keep the previous factor', async () => {
    mockSource.read.mockResolvedValue(0);

    await expect(service.calibrate('bench', 200)).rejects.toThrow(CalibrationError);
    expect(registry.get('bench').calibrationFactor).toBe(1);
  });

  it('should fail when a sample read fails', async () => {
    mockSource.read
      .mockResolvedValueOnce(2)
      .mockResolvedValueOnce(2)
      .mockRejectedValueOnce(new ReadFaultError('bench', 'bus error'));

    await expect(service.calibrate('bench', 200)).rejects.toThrow(
      '[bench] Sample 3/10 failed: [bench] bus error',
    );
    expect(registry.get('bench').calibrationFactor).toBe(1);
  });

  it('should time out a sensor that never answers', async () => {
    await setup({ READ_TIMEOUT_MS: '20' });
    mockSource.read.mockReturnValue(new Promise<number>(() => undefined));

    const calibration = service.calibrate('bench', 200);

    await expect(calibration).rejects.toBeInstanceOf(CalibrationError);
    await expect(calibration).rejects.toThrow(
      '[bench] Sample 1/10 failed: [bench] Sensor read timed out after 20ms',
    );
    expect(mockSource.read).toHaveBeenCalledTimes(1);
    expect(registry.get('bench').calibrationFactor).toBe(1);
  });

  it('should fail on a non-numeric sample', async () => {
    mockSource.read.mockResolvedValue(Number.NaN);

    await expect(service.calibrate('bench', 200)).rejects.toThrow(
      '[bench] Sample 1/10 failed: [bench] Sensor returned a non-numeric value: NaN',
    );
  });

  it('should reject a non-positive reference load', async () => {
    await expect(service.calibrate('bench', 0)).rejects.toThrow('Reference load must be positive');
    expect(mockSource.read).not.toHaveBeenCalled();
  });

  it('should reject an unknown device', async () => {
    await expect(service.calibrate('garage', 100)).rejects.toThrow('[garage] Unknown device');
  });
});
