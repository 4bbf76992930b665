export const SAMPLE_LOG = [
  'Electronics International CGR-30P',
  'Aircraft ID: N456CG',
  'Model: CGR-30P',
  'Download Date: 04/02/2024 16:45:10',
  'Temperature Units: F',
  '',
  'Date,Time,RPM,MAP,E1,E2,E3,E4,C1,C2,C3,C4,Oil Temp,Oil Press,Fuel Press,FF,Volts,Amps,G,OAT,Hobbs',
  '04/02/2024,14:00:00,2450,24.8,1320,1340,1310,1335,375,382,368,390,185,62,24.5,10.2,14.1,12.5,1.02,55,812.3',
  '04/02/2024,14:00:01,2455,24.8,1322,1341,---,1336,376,382,369,391,185,62,24.5,10.3,14.1,12.4,1.01,55,812.3',
  '04/02/2024,14:00:02,2460,24.9,1325,1343,1312,1338,376,383,369,391,186,61,24.4,10.3,14.0,ERR,0.98,55,812.3',
  '04/02/2024,15:30:00,1000,15.0,900,910,905,915,300,305,298,310,170,45,22.0,3.0,13.8,5.0,1.00,52,813.8',
].join('\r\n') + '\r\n';

export const METRIC_LOG = [
  'Tail Number,C-FXYZ',
  'Date/Time,RPM,EGT 1 (C),CHT 1 [C],Oil Temp (C),Oil Press (kPa),OAT',
  '2024-05-01T09:00:00,2300,700,180,90,400,10',
].join('\n');

export const encodeText = (text: string) => new TextEncoder().encode(text);
