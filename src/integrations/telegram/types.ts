export interface TelegramApiErrorParameters {
  retry_after?: number
  migrate_to_chat_id?: number
}

export interface TelegramApiErrorResponse {
  ok: false
  error_code: number
  description: string
  parameters?: TelegramApiErrorParameters
}

export interface TelegramApiSuccessResponse<T> {
  ok: true
  result: T
}

export type TelegramApiResponse<T> = TelegramApiSuccessResponse<T> | TelegramApiErrorResponse

export interface TelegramUser {
  id: number
  is_bot: boolean
  username?: string
  first_name?: string
}

export interface TelegramChat {
  id: number
  type: 'private' | 'group' | 'supergroup' | 'channel'
  title?: string
  username?: string
}

export interface TelegramMessage {
  message_id: number
  date: number
  chat: TelegramChat
  text?: string
  message_thread_id?: number
}

export interface TelegramSendMessageParams {
  chatId: string | number
  threadId?: number
  text: string
  disableWebPreview?: boolean
}
