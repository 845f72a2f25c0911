import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { createDataset } from '../dataset';
import {
    checkCoordinates,
    datasourceToWire,
    decodeTime,
    defaultName,
    guessCoordinates,
    guessProperties,
    newDatasource,
    parseCatalog,
    parseDatasource,
    withProperties,
} from '../datasource';
import { bboxPolygon } from '../geometry';
import { createGeoTable, createTable } from '../tabular';

const feature = {
    id: 'wave',
    type: 'Feature',
    geometry: { type: 'Point', coordinates: [174, -41] },
    properties: {
        name: 'Wave hindcast',
        tstart: '2020-01-01T00:00:00Z',
        driver: 'onzarr',
        args: { urlpath: 'gs://bucket/wave.zarr' },
        coordinates: { t: 'time' },
        tags: ['waves'],
    },
};

describe('wire format', () => {
    it('parses a detailed datasource', () => {
        const ds = parseDatasource(feature);
        expect(ds.id).toBe('wave');
        expect(ds.name).toBe('Wave hindcast');
        expect(ds.geom).toEqual({ type: 'Point', coordinates: [174, -41] });
        expect(ds.driver).toBe('onzarr');
        expect(ds.driverArgs).toEqual({ urlpath: 'gs://bucket/wave.zarr' });
        expect(ds.coordinates).toEqual({ t: 'time' });
        expect(ds.tags).toEqual(['waves']);
        expect(ds.tend).toBeNull();
        expect(ds.schema).toEqual({ attrs: {}, dims: {}, coords: {}, data_vars: {} });
        expect(ds.phase).toBe('detailed');
        expect(Object.isFrozen(ds)).toBe(true);
    });

    it('parses catalog entries as summaries and stringifies numeric ids', () => {
        const list = parseCatalog({ type: 'FeatureCollection', features: [feature, { id: 42, properties: {} }] });
        expect(list.map((d) => d.id)).toEqual(['wave', '42']);
        expect(list.map((d) => d.phase)).toEqual(['summary', 'summary']);
        expect(list[1].driver).toBe('_null');
    });

    it('rejects unsupported geometry types', () => {
        expect(() => parseDatasource({ ...feature, geometry: { type: 'LineString', coordinates: [[0, 0], [1, 1]] } })).toThrow(
            /Geometry must be Point, MultiPoint or Polygon/
        );
    });

    it('writes a flat body with args and geom', () => {
        const body = datasourceToWire(parseDatasource(feature));
        expect(body.id).toBe('wave');
        expect(body.geom).toEqual({ type: 'Point', coordinates: [174, -41] });
        expect(body.args).toEqual({ urlpath: 'gs://bucket/wave.zarr' });
        expect(body).not.toHaveProperty('driverArgs');
        expect(body).not.toHaveProperty('phase');
    });
});

describe('construction', () => {
    it('derives a display name from the id', () => {
        expect(defaultName('my_wave-data')).toBe('My wave data');
    });

    it('fills defaults for a new datasource', () => {
        const ds = newDatasource('my_wave-data', { description: 'Test' });
        expect(ds.name).toBe('My wave data');
        expect(ds.description).toBe('Test');
        expect(ds.driver).toBe('_null');
        expect(ds.geom).toBeNull();
    });

    it('ignores undefined properties on update', () => {
        const ds = newDatasource('wave', { name: 'Wave' });
        const next = withProperties(ds, { name: undefined, description: 'changed' });
        expect(next.name).toBe('Wave');
        expect(next.description).toBe('changed');
        expect(ds.description).toBe('');
    });
});

describe('property guessing', () => {
    beforeEach(() => {
        vi.spyOn(console, 'warn').mockImplementation(() => {});
    });

    afterEach(() => {
        vi.restoreAllMocks();
    });

    it('maps coordinate names to roles by prefix', () => {
        expect(guessCoordinates(['longitude', 'latitude', 'time', 'lon2', 'depth'])).toEqual({
            x: 'longitude',
            y: 'latitude',
            t: 'time',
            z: 'depth',
        });
    });

    it('decodes CF and plain time values', () => {
        expect(decodeTime(24, 'hours since 2000-01-01')?.toISOString()).toBe('2000-01-02T00:00:00.000Z');
        expect(decodeTime(90, 'minutes since 2000-01-01 00:00:00')?.toISOString()).toBe('2000-01-01T01:30:00.000Z');
        expect(decodeTime(0)?.toISOString()).toBe('1970-01-01T00:00:00.000Z');
        expect(decodeTime('2021-03-04T05:06:07Z')?.toISOString()).toBe('2021-03-04T05:06:07.000Z');
        expect(decodeTime('not a time')).toBeNull();
    });

    it('guesses schema, roles, extent and time range from a dataset', () => {
        const data = createDataset({
            coords: {
                time: { dims: ['time'], data: [0, 24], attrs: { units: 'hours since 2000-01-01' } },
                lon: { dims: ['lon'], data: [170, 175] },
                lat: { dims: ['lat'], data: [-45, -40] },
            },
            dataVars: { hs: { dims: ['time'], data: [1, 2] } },
        });
        const ds = guessProperties(newDatasource('wave'), data);

        expect(ds.coordinates).toEqual({ t: 'time', x: 'lon', y: 'lat' });
        expect(ds.geom).toEqual(bboxPolygon(170, -45, 175, -40));
        expect(ds.tstart).toBe('2000-01-01T00:00:00.000Z');
        expect(ds.tend).toBe('2000-01-02T00:00:00.000Z');
        expect(ds.schema.dims).toEqual({ time: 2, lon: 2, lat: 2 });
        expect(Object.keys(ds.schema.data_vars)).toEqual(['hs']);
        expect(console.warn).toHaveBeenCalledWith('[datasource] Setting geometry as a bbox from x and y coordinates');
    });

    it('keeps values that are already set', () => {
        const data = createDataset({ coords: { time: { dims: ['time'], data: [0, 1000] } } });
        const ds = guessProperties(newDatasource('wave', { tstart: '1999-01-01T00:00:00Z' }), data);
        expect(ds.tstart).toBe('1999-01-01T00:00:00Z');
        expect(ds.tend).toBe('1970-01-01T00:00:01.000Z');
    });

    it('falls back to the epoch start and leaves forecast ends open', () => {
        const data = createTable([{ value: 1 }, { value: 2 }]);
        const ds = guessProperties(newDatasource('obs', { pforecast: 'P7D' }), data);
        expect(ds.tstart).toBe('1970-01-01T00:00:00Z');
        expect(ds.tend).toBeNull();
        expect(ds.schema.data_vars).toEqual({ value: { dims: ['index'], attrs: {} } });
        expect(console.warn).toHaveBeenCalledWith('[datasource] Setting tstart to 1970-01-01T00:00:00Z');
    });

    it('takes the extent of geo-table geometries', () => {
        const data = createGeoTable(
            [{ id: 1 }, { id: 2 }],
            [
                { type: 'Point', coordinates: [1, 5] },
                { type: 'Point', coordinates: [3, 2] },
            ]
        );
        const ds = guessProperties(newDatasource('sites'), data, { append: true });
        expect(ds.geom).toEqual(bboxPolygon(1, 2, 3, 5));
        expect(ds.tend).toBeNull();
    });

    it('reports mapped coordinates missing from the schema', () => {
        const ds = newDatasource('wave', { coordinates: { t: 'time', x: 'lon' } });
        const withLon = withProperties(ds, {
            schema: { attrs: {}, dims: { lon: 1 }, coords: { lon: { dims: ['lon'], attrs: {} } }, data_vars: {} },
        });
        expect(checkCoordinates(withLon)).toEqual(['time']);
    });
});
