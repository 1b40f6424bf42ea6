export * from './module-options.interface';
export * from './module-async-options.interface';
export * from './ssh-users-report.interface';
