import { DAY_IN_SECONDS, HOUR_IN_SECONDS } from '../../utils';

export const RATES_HTTP_CLIENT = 'RATES_HTTP_CLIENT';
export const RATES_QUERY_OPTIONS = 'RATES_QUERY_OPTIONS';

export const FRANKFURTER_PROVIDER_NAME = 'frankfurter';

export const LATEST_RATES_TTL_SECONDS = HOUR_IN_SECONDS;
export const CONVERSION_TTL_SECONDS = HOUR_IN_SECONDS;
export const HISTORICAL_RATES_TTL_SECONDS = DAY_IN_SECONDS;
