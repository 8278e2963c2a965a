export * from './telegram.formatter';
export * from './telegram.module';
export * from './telegram.service';
