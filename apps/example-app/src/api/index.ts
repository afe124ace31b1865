import { CreateRoom } from './CreateRoom';
import { GetMessages } from './GetMessages';
import { GetPublicRooms } from './GetPublicRooms';
import { SendMessage } from './SendMessage';
import { SendStateEvent } from './SendStateEvent';

export * from './CreateRoom';
export * from './GetMessages';
export * from './GetPublicRooms';
export * from './SendMessage';
export * from './SendStateEvent';

/**
 * Every endpoint of the chat API, keyed by client method name.
 */
export const ChatApi = {
    createRoom: CreateRoom,
    sendMessage: SendMessage,
    sendStateEvent: SendStateEvent,
    getMessages: GetMessages,
    getPublicRooms: GetPublicRooms,
};
