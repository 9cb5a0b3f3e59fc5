export * from './lib/api.module';
export * from './lib/memo.controller';
export * from './lib/memo-error.filter';
export * from './lib/dto/memo-request.dto';
