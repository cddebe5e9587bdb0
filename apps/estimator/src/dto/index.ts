export * from './estimate-request.dto';
export * from './market-definition.dto';
export * from './price-observation.dto';
export * from './weather-query.dto';
