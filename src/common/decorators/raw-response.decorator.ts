import { SetMetadata } from '@nestjs/common';

export const RAW_RESPONSE_KEY = 'rawResponse';

// Handlers marked with this bypass the response envelope (streams).
export const RawResponse = () => SetMetadata(RAW_RESPONSE_KEY, true);
