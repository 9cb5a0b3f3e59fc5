export * from './lib/memo-session.module';
export * from './lib/memo-session.service';
export * from './lib/interfaces/memo-session.interface';
