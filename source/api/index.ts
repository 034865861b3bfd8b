export {
	dispatch,
	handlers,
	type ApiRequest,
	type Handler,
	type HandlerContext,
	type HandlerName,
} from './handlers.js';
export {toErrorResponse, type ApiResponse, type ErrorBody} from './responses.js';
