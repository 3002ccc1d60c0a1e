export * from './controllers';
export * from './dto';
export * from './modules';
