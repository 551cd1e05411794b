import { Device } from '../devices/device-registry.service';
import { getDeviceType } from '../devices/device-types';
import { ReadingRecord } from '../readings/interfaces/reading-store.interface';
import { buildTestConfig } from '../test-utils';
import {
  DeviceRuleContext,
  DraftInsight,
  deviceInsights,
  monthlySavings,
  priorityLevel,
  rankInsights,
  systemInsights,
} from './insight-rules';
import { DeviceAnalysis, InsightCategory } from './interfaces/analysis.types';
import { computeUsageStatistics } from './statistics';

const config = buildTestConfig({ tv: { name: 'TV', type: 'tv' }, fridge: { name: 'Fridge', type: 'fridge' } });
const HOUR = 3600;

function hourly(powers: number[]): ReadingRecord[] {
  return powers.map((powerWatts, i) => ({
    deviceId: 'tv',
    timestamp: new Date(Date.UTC(2026, 0, 5, i)),
    rawValue: powerWatts,
    powerWatts,
    energyWh: 0,
    cost: 0,
    ratePerKwh: 0.2,
  }));
}

function device(id: string): Device {
  const entry = config.devices.find((d) => d.id === id);
  if (!entry) throw new Error(`missing test device ${id}`);
  return { ...entry };
}

function context(
  powers: number[],
  options: {
    deviceId?: string;
    onThresholdWatts?: number;
    analysis?: Partial<DeviceAnalysis>;
    ctx?: Partial<DeviceRuleContext>;
  } = {},
): DeviceRuleContext {
  const target = device(options.deviceId ?? 'tv');
  const readings = hourly(powers);
  const statistics = computeUsageStatistics(readings, options.onThresholdWatts ?? 10, 0);
  const period = { from: '2026-01-05T00:00:00.000Z', to: '2026-01-06T00:00:00.000Z' };
  return {
    device: target,
    type: getDeviceType(target.type),
    readings,
    durations: readings.map(() => HOUR),
    analysis: {
      deviceId: target.id,
      deviceName: target.name,
      statistics,
      pattern: 'intermittent',
      anomalies: [],
      efficiencyScore: {
        deviceId: target.id,
        period,
        score: 100,
        factors: {
          peakToAverageRatio: 1,
          dutyCycleVolatility: 0,
          dutyCycleConsistency: 1,
          peakPenalty: 0,
          volatilityPenalty: 0,
        },
      },
      ...options.analysis,
    },
    policy: config.analysis,
    ratePerKwh: 0.2,
    monthlyScale: 30,
    peakShiftSavings: 0,
    peakEnergyWh: 0,
    ...options.ctx,
  };
}

function ofCategory(drafts: DraftInsight[], category: InsightCategory): DraftInsight[] {
  return drafts.filter((d) => d.category === category);
}

describe('insight rules', () => {
  describe('deviceInsights', () => {
    it('should produce nothing for a steady load above the standby band', () => {
      expect(deviceInsights(context([50, 50]))).toEqual([]);
    });

    it('should report a spike as a maintenance insight', () => {
      const ctx = context([10, 10, 100], {
        onThresholdWatts: 5,
        analysis: {
          anomalies: [
            {
              deviceId: 'tv',
              timestamp: '2026-01-05T02:00:00.000Z',
              powerWatts: 100,
              thresholdWatts: 40,
              sigma: 3.2,
            },
          ],
        },
      });

      expect(deviceInsights(ctx)).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'maintenance',
          message:
            'TV spiked to 100 W at 2026-01-05T02:00:00.000Z, 3.2 standard deviations above its 40 W average ' +
            '(1 reading(s) flagged). Inspect it for a failing component.',
          // 60 Wh above the threshold, at 0.2/kWh, over 30 one-day periods
          estimatedSavings: 0.36,
        },
      ]);
    });

    it('should suggest the type tip when the efficiency score is low', () => {
      const base = context([150, 0, 0, 0, 0, 0]);
      const ctx = context([150, 0, 0, 0, 0, 0], {
        analysis: {
          efficiencyScore: {
            ...base.analysis.efficiencyScore,
            score: 60,
            factors: { ...base.analysis.efficiencyScore.factors, peakToAverageRatio: 6, peakPenalty: 40 },
          },
        },
      });

      expect(deviceInsights(ctx)).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'efficiency',
          message:
            'TV scored 60/100: its peaks reach 6.0x its average draw. ' +
            'Enable the power-saving picture mode and lower the backlight.',
          estimatedSavings: 0.15,
        },
      ]);
    });

    it('should flag an always-on device that is not expected to be', () => {
      const drafts = deviceInsights(context([50, 50], { analysis: { pattern: 'always-on' } }));

      expect(ofCategory(drafts, 'usage-pattern')).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'usage-pattern',
          message:
            'TV was on 100% of the time, which is unusual for a television. ' +
            'Switch the TV and its set-top box off at the wall overnight.',
          estimatedSavings: 0.14,
        },
      ]);
    });

    it('should accept an always-on fridge', () => {
      const drafts = deviceInsights(
        context([50, 50], { deviceId: 'fridge', analysis: { pattern: 'always-on' } }),
      );

      expect(ofCategory(drafts, 'usage-pattern')).toEqual([]);
    });

    it('should measure standby draw between the floor and the on threshold', () => {
      const drafts = deviceInsights(context([3, 3, 100, 3, 0.5]));

      expect(ofCategory(drafts, 'environmental')).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'environmental',
          message:
            'TV draws 3.0 W while idle (0.01 kWh over the period). ' +
            'A switched outlet or smart plug would remove this standby load.',
          estimatedSavings: 0.05,
        },
      ]);
    });

    it('should suggest shifting peak-rate use', () => {
      const drafts = deviceInsights(
        context([50, 50], { ctx: { peakEnergyWh: 2000, peakShiftSavings: 3 } }),
      );

      expect(ofCategory(drafts, 'cost')).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'cost',
          message:
            'TV used 2.00 kWh during peak-rate hours. ' +
            'Moving that use to off-peak hours would save about $1.50 per month.',
          estimatedSavings: 1.5,
        },
      ]);
    });

    it('should summarize the cost of a device that drew energy', () => {
      const base = context([50, 50]);
      const ctx = context([50, 50], {
        analysis: {
          statistics: { ...base.analysis.statistics, totalEnergyWh: 1500, totalCost: 0.3 },
        },
      });

      expect(deviceInsights(ctx)).toEqual([
        {
          scope: 'device',
          deviceId: 'tv',
          category: 'cost',
          message: 'TV used 1.50 kWh costing $0.30 over the period, about $9.00 per month.',
          estimatedSavings: 0,
        },
      ]);
    });
  });

  describe('systemInsights', () => {
    it('should describe the household peak, projected cost and top consumer', () => {
      const tv = context([50, 50]).analysis;
      const fridge = context([50, 50], { deviceId: 'fridge' }).analysis;

      const drafts = systemInsights({
        devices: [
          { ...tv, statistics: { ...tv.statistics, totalEnergyWh: 500 } },
          { ...fridge, statistics: { ...fridge.statistics, totalEnergyWh: 1500 } },
        ],
        deviceNames: new Map([
          ['tv', 'TV'],
          ['fridge', 'Fridge'],
        ]),
        peakHour: 8,
        totalEnergyWh: 2000,
        totalCost: 0.4,
        monthlyScale: 30,
      });

      expect(drafts.map((d) => d.message)).toEqual([
        'Household demand peaks around 08:00. Running flexible loads outside this hour lowers peak demand.',
        'Projected monthly electricity cost: $12.00 ($0.40 for 2.00 kWh over the period).',
        'Fridge accounts for 75% of monitored energy use.',
      ]);
      expect(drafts.every((d) => d.scope === 'system' && d.deviceId === null)).toBe(true);
    });

    it('should skip the peak hour when it is unknown', () => {
      const drafts = systemInsights({
        devices: [],
        deviceNames: new Map(),
        peakHour: -1,
        totalEnergyWh: 0,
        totalCost: 0,
        monthlyScale: 30,
      });

      expect(drafts).toEqual([]);
    });
  });

  describe('rankInsights', () => {
    const generatedAt = new Date('2026-01-06T00:00:00.000Z');
    const validUntil = new Date('2026-01-06T06:00:00.000Z');

    function draftOf(
      deviceId: string,
      category: InsightCategory,
      estimatedSavings: number,
      message = 'msg',
    ): DraftInsight {
      return { scope: 'device', deviceId, category, message, estimatedSavings };
    }

    it('should order by savings, then feasibility, then device and message', () => {
      const ranked = rankInsights(
        [
          draftOf('b', 'cost', 0),
          draftOf('a', 'maintenance', 5),
          draftOf('a', 'cost', 0, 'zeta'),
          draftOf('c', 'usage-pattern', 5),
          draftOf('a', 'cost', 0, 'alpha'),
          draftOf('z', 'efficiency', 1.2),
        ],
        generatedAt,
        validUntil,
      );

      expect(ranked.map((i) => `${i.priority}:${i.deviceId}:${i.category}:${i.message}`)).toEqual([
        '1:c:usage-pattern:msg',
        '2:a:maintenance:msg',
        '3:z:efficiency:msg',
        '4:a:cost:alpha',
        '5:a:cost:zeta',
        '6:b:cost:msg',
      ]);
      expect(ranked.map((i) => i.priorityLevel)).toEqual(['high', 'high', 'medium', 'low', 'low', 'low']);
    });

    it('should stamp generation and validity times', () => {
      const [insight] = rankInsights([draftOf('a', 'cost', 0)], generatedAt, validUntil);

      expect(insight.generatedAt).toBe('2026-01-06T00:00:00.000Z');
      expect(insight.validUntil).toBe('2026-01-06T06:00:00.000Z');
    });
  });

  describe('priorityLevel', () => {
    it.each([
      [5, 'high'],
      [4.99, 'medium'],
      [1, 'medium'],
      [0.99, 'low'],
      [0, 'low'],
    ] as const)('should map savings %s to %s', (savings, level) => {
      expect(priorityLevel(savings)).toBe(level);
    });
  });

  describe('monthlySavings', () => {
    it('should scale recovered energy to a month and round to cents', () => {
      expect(monthlySavings(1000, { ratePerKwh: 0.25, monthlyScale: 7.5 }, 0.5)).toBe(0.94);
    });
  });
});
