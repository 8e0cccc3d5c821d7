// SmartREST 2.0 static templates (comma separated, one request per line)
import type { MeasurementSample } from '../../shared/src/types.js';

export const UPSTREAM_TOPIC = 's/us';
export const DOWNSTREAM_TOPIC = 's/ds';

export const RESTART_OPERATION = 'c8y_Restart';

export type AlarmSeverity = 'CRITICAL' | 'MAJOR' | 'MINOR' | 'WARNING';

const ALARM_TEMPLATES: Record<AlarmSeverity, string> = {
  CRITICAL: '301',
  MAJOR: '302',
  MINOR: '303',
  WARNING: '304',
};

/** Quote a field when it contains a separator, quote or line break. */
export function csvField(value: string | number): string {
  const s = String(value);
  return /[",\r\n]/.test(s) ? `"${s.replace(/"/g, '""')}"` : s;
}

export function smartRestLine(template: string, ...fields: Array<string | number>): string {
  return [template, ...fields.map(csvField)].join(',');
}

/** Split one line into fields, honouring quoted fields. */
export function parseSmartRestLine(line: string): string[] {
  const fields: string[] = [];
  let cur = '';
  let quoted = false;
  for (let i = 0; i < line.length; i++) {
    const ch = line[i];
    if (quoted) {
      if (ch === '"' && line[i + 1] === '"') { cur += '"'; i++; }
      else if (ch === '"') quoted = false;
      else cur += ch;
    } else if (ch === '"') {
      quoted = true;
    } else if (ch === ',') {
      fields.push(cur);
      cur = '';
    } else {
      cur += ch;
    }
  }
  fields.push(cur);
  return fields;
}

export function registrationMessage(deviceName: string, deviceType: string): string {
  return smartRestLine('100', deviceName, deviceType);
}

export function measurementMessage(sample: MeasurementSample): string {
  const ts = sample.timestamp;
  return [
    smartRestLine('200', 'c8y_Voltage', 'V', sample.voltage, 'V', ts),
    smartRestLine('200', 'c8y_Current', 'A', sample.current, 'A', ts),
    smartRestLine('200', 'c8y_Power', 'P', sample.power, 'W', ts),
    smartRestLine('200', 'c8y_EnergyConsumption', 'E', sample.kwh, 'kWh', ts),
  ].join('\n');
}

export function heartbeatMessage(deviceName: string): string {
  return smartRestLine('400', 'c8y_Heartbeat', `Heartbeat from ${deviceName}`);
}

export function alarmMessage(type: string, text: string, severity: AlarmSeverity): string {
  return smartRestLine(ALARM_TEMPLATES[severity], type, text);
}

export function operationExecuting(operation: string): string {
  return smartRestLine('501', operation);
}

export function operationSuccessful(operation: string): string {
  return smartRestLine('503', operation);
}
