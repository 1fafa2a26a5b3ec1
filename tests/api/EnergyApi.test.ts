/**
 * Tests for EnergyApi
 */
import { describe, it, expect, vi, beforeEach } from 'vitest';
import { EnergyApi } from '../../src/api/EnergyApi.js';
import { ApiError } from '../../src/utils/errors.js';

const mockGet = vi.fn();

describe('EnergyApi', () => {
    let api: EnergyApi;

    beforeEach(() => {
        vi.resetAllMocks();
        api = new EnergyApi({ get: mockGet });
    });

    describe('getEnergyFlow', () => {
        it('should call the energy flow endpoint and return data', async () => {
            const data = { pvPower: 3.2, loadPower: 1.1, batterySoc: 64 };
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data });

            const result = await api.getEnergyFlow('st-1');

            expect(mockGet).toHaveBeenCalledWith('/device/sigen/station/energyflow', {
                params: { id: 'st-1', refreshFlag: 'true' },
            });
            expect(result).toEqual(data);
        });

        it('should raise the envelope code and message', async () => {
            mockGet.mockResolvedValue({ code: 11002, msg: 'token invalid', data: null });

            await expect(api.getEnergyFlow('st-1')).rejects.toMatchObject({
                message: 'Energy flow: API error code 11002, token invalid',
                code: 11002,
            });
        });

        it('should reject a body that is not an envelope', async () => {
            mockGet.mockResolvedValue('<html>maintenance</html>');

            const error = await api.getEnergyFlow('st-1').catch((e: unknown) => e);

            expect(error).toBeInstanceOf(ApiError);
            expect(error).toMatchObject({ message: 'Energy flow: unexpected response shape' });
        });

        it('should reject a success envelope without a data object', async () => {
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data: [] });

            await expect(api.getEnergyFlow('st-1')).rejects.toThrow('Energy flow: response has no data object');
        });

        it('should let transport errors through', async () => {
            mockGet.mockRejectedValue(new ApiError('GET /device/sigen/station/energyflow failed: Network Error'));

            await expect(api.getEnergyFlow('st-1')).rejects.toThrow('Network Error');
        });
    });

    describe('getDailyEnergySummary', () => {
        it('should query a single day', async () => {
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data: { powerGeneration: 12.4 } });

            const result = await api.getDailyEnergySummary('st-1', '20240612');

            expect(mockGet).toHaveBeenCalledWith('/data-process/sigen/station/statistics/energy', {
                params: { dateFlag: '1', endDate: '20240612', startDate: '20240612', stationId: 'st-1', fulfill: 'false' },
            });
            expect(result).toEqual({ powerGeneration: 12.4 });
        });
    });

    describe('getDailyConsumption', () => {
        it('should keep only object entries of the detail list', async () => {
            mockGet.mockResolvedValue({
                code: 0,
                msg: 'success',
                data: {
                    baseLoadConsumption: 7.5,
                    consumptionDetailList: [{ dataTime: '20240612 00:00', baseLoad: 0.3 }, null, 'x'],
                },
            });

            const result = await api.getDailyConsumption('st-1', '20240612');

            expect(mockGet).toHaveBeenCalledWith('/data-process/sigen/station/statistics/station-consumption', {
                params: { dateFlag: '1', endDate: '20240612', startDate: '20240612', stationId: 'st-1' },
            });
            expect(result).toEqual({
                baseLoadConsumption: 7.5,
                consumptionDetailList: [{ dataTime: '20240612 00:00', baseLoad: 0.3 }],
            });
        });

        it('should default a missing detail list to empty', async () => {
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data: { baseLoadConsumption: 7.5 } });

            const result = await api.getDailyConsumption('st-1', '20240612');

            expect(result.consumptionDetailList).toEqual([]);
        });
    });

    describe('getSunriseSunset', () => {
        it('should return the string times', async () => {
            mockGet.mockResolvedValue({
                code: 0,
                msg: 'success',
                data: { sunriseTime: '05:01', sunsetTime: '21:56', dayLength: 60 },
            });

            const result = await api.getSunriseSunset('st-1', '20240612');

            expect(mockGet).toHaveBeenCalledWith('/device/sigen/device/weather/sun', {
                params: { stationId: 'st-1', date: '20240612' },
            });
            expect(result.sunriseTime).toBe('05:01');
            expect(result.sunsetTime).toBe('21:56');
        });

        it('should drop non-string times', async () => {
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data: { sunriseTime: 501 } });

            const result = await api.getSunriseSunset('st-1', '20240612');

            expect(result.sunriseTime).toBeUndefined();
            expect(result.sunsetTime).toBeUndefined();
        });
    });

    describe('getStationInfo', () => {
        it('should call the station home endpoint without parameters', async () => {
            mockGet.mockResolvedValue({ code: 0, msg: 'success', data: { stationId: 'st-1', pvCapacity: 8.2 } });

            const result = await api.getStationInfo();

            expect(mockGet).toHaveBeenCalledWith('/device/owner/station/home', undefined);
            expect(result).toEqual({ stationId: 'st-1', pvCapacity: 8.2 });
        });
    });
});
