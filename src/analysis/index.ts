export * from './field-normaliser';
export * from './range.filter';
export * from './entity.joiner';
export * from './loyalty.classifier';
export * from './time-series.generator';
export * from './volume.computer';
export * from './operator.computer';
export * from './latency.computer';
export * from './breakdown.computer';
export * from './sentiment.classifier';
export * from './insight.summariser';
export * from './pipeline';
