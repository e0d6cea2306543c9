/**
 * Request body parsing for the run/simulate endpoints
 */

import { ParameterError } from '../errors/shakemap-errors';
import { SimulateParams } from '../overlay/simulator';

type SimulateField = 'lat' | 'lon' | 'depth' | 'mag';

export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * numbers and numeric strings ("13.75", " 5 ") are accepted
 */
function parseNumberField(body: Record<string, unknown>, field: SimulateField): number {
  const raw = body[field];
  if (raw === undefined || raw === null) {
    throw new ParameterError(`missing parameter: ${field}`);
  }

  let value = NaN;
  if (typeof raw === 'number') {
    value = raw;
  } else if (typeof raw === 'string' && raw.trim() !== '') {
    value = Number(raw.trim());
  }

  if (!Number.isFinite(value)) {
    throw new ParameterError(`invalid number for ${field}: ${JSON.stringify(raw)}`);
  }
  return value;
}

export function parseSimulateParams(body: unknown): SimulateParams {
  if (!isPlainObject(body) || Object.keys(body).length === 0) {
    throw new ParameterError('request body with lat, lon, depth and mag is required');
  }

  // fields are checked in this order; the first bad one is reported
  return {
    lat: parseNumberField(body, 'lat'),
    lon: parseNumberField(body, 'lon'),
    depth_km: parseNumberField(body, 'depth'),
    mag: parseNumberField(body, 'mag'),
  };
}

export function isSimulateMode(body: Record<string, unknown>): boolean {
  return body.mode === 'simulate';
}

/**
 * optional force flag; anything but true, "true", 1 or "1" means false
 */
export function parseForceFlag(value: unknown): boolean {
  return value === true || value === 1 || value === 'true' || value === '1';
}

/**
 * POST /api/run accepts an empty body; anything present must be an object
 */
export function readRunBody(body: unknown): Record<string, unknown> {
  if (body === undefined || body === null) {
    return {};
  }
  if (!isPlainObject(body)) {
    throw new ParameterError('request body must be a JSON object');
  }
  return body;
}
