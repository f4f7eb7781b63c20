// examples/src/chat/chat.controller.ts

import { BadRequestException, Body, Controller, Get, NotFoundException, Param, Post } from '@nestjs/common';
import { ChatMessage } from '../../../src';
import { ChatReplyDto, ChatRequestDto } from './chat.dto';
import { ChatService } from './chat.service';

@Controller('chat')
export class ChatController {
  constructor(private readonly chatService: ChatService) {}

  @Post()
  async chat(@Body() request: ChatRequestDto): Promise<ChatReplyDto> {
    if (typeof request.message !== 'string' || !request.message.trim()) {
      throw new BadRequestException('message is required');
    }
    return this.chatService.reply(request);
  }

  @Get('health')
  health(): { status: string } {
    return { status: 'ok' };
  }

  @Get(':sessionId')
  history(@Param('sessionId') sessionId: string): ChatMessage[] {
    const history = this.chatService.history(sessionId);
    if (!history) {
      throw new NotFoundException(`Session ${sessionId} not found`);
    }
    return history;
  }
}
