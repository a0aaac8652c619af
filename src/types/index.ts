export * from './calibration'
