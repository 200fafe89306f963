export { requestToQueryString, requestFromQueryString, inferScalar } from './QueryString';
export { responseToHttp } from './HttpResponse';
export type { HttpResponse } from './HttpResponse';
