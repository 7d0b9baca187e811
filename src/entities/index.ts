export * from './session.entity';
export * from './message.entity';
