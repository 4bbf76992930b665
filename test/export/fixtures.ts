import { CylinderReadings, EngineData } from '../../src/models/engine';
import { FlightSession } from '../../src/models/session';
import type { TelemetryLog } from '../../src/models/session';

export function sampleSession(): FlightSession {
  const session = new FlightSession(1);
  session.startTime = new Date(2024, 2, 14, 10, 30, 0);
  session.intervalSecs = 6;
  session.records = [
    {
      timestamp: new Date(2024, 2, 14, 10, 30, 0),
      engine: new EngineData({
        rpm: 2400,
        manifoldPressure: 24.5,
        egts: CylinderReadings.fromValues([1300, 1310]),
        chts: CylinderReadings.fromValues([380, null]),
        oilTemperature: 190,
        volts: 14.1,
      }),
    },
    { timestamp: null, engine: new EngineData() },
  ];
  return session;
}

export function sampleLog(): TelemetryLog {
  const empty = new FlightSession(2);
  empty.warnings.push('Could not locate flight data start marker');

  return {
    emsType: 'jpi-edm',
    model: 'EDM-830',
    aircraftId: 'N-12345',
    downloadTime: new Date(Date.UTC(2024, 2, 14, 18, 0, 0)),
    sourceUnit: 'fahrenheit',
    sessions: [sampleSession(), empty],
    warnings: [],
  };
}
