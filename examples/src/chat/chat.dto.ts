// examples/src/chat/chat.dto.ts

export class ChatRequestDto {
    message!: string;
    user_id?: string;
    session_id?: string;
}

export class ChatReplyDto {
    reply!: string;
    session_id!: string | null;
    turns!: number;
}
