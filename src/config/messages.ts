import type { InlineButton } from '../application/messaging/QuizTransport';

export const CALLBACK_ANONYMOUS = 'anonymous_true';
export const CALLBACK_ATTRIBUTED = 'anonymous_false';

export interface QuizTextConfig {
  readonly greeting: (name: string) => string;
  readonly welcomeBody: string;
  readonly jsonTemplate: string;
  readonly styleChoice: string;
  readonly styleButtons: readonly (readonly InlineButton[])[];
  readonly toggleButtons: readonly (readonly InlineButton[])[];
  readonly preferenceSelected: (anonymous: boolean) => string;
  readonly payloadInstructions: (anonymous: boolean) => string;
  readonly processing: string;
  readonly validated: (count: number, anonymous: boolean) => string;
  readonly decodeError: string;
  readonly validationError: (detail: string) => string;
  readonly completed: (count: number, anonymous: boolean) => string;
  readonly partial: (sent: number, total: number) => string;
  readonly restartHeader: string;
  readonly redirect: string;
  readonly genericError: string;
  readonly rateLimited: (retryAfterSec: number) => string;
  readonly help: string;
  readonly quickstart: string;
  readonly templateHeader: string;
  readonly templateHint: string;
  readonly status: (info: { name: string; chatId: number; anonymous: boolean; activeUsers: number }) => string;
  readonly toggle: (anonymous: boolean) => string;
}

/** Escapa os caracteres especiais do Markdown legado do Telegram em texto do usuário. */
export function escapeMarkdown(text: string): string {
  return text.replace(/[_*`[]/g, (char) => `\\${char}`);
}

export function quizStyleLabel(anonymous: boolean): string {
  return anonymous ? '🔒 Anonymous' : '👤 Non-Anonymous';
}

export const JSON_TEMPLATE = JSON.stringify({
  all_q: [
    {
      q: 'Capital of France? 🇫🇷',
      o: ['London', 'Paris', 'Berlin', 'Madrid'],
      c: 1,
      e: 'Paris is the capital and largest city of France 🗼',
    },
    {
      q: 'What is 2+2? 🔢',
      o: ['3', '4', '5', '6'],
      c: 1,
      e: 'Basic addition: 2+2=4 ✅',
    },
  ],
});

export const TEXT: QuizTextConfig = {
  greeting: (name: string): string => `👋 Hello **${escapeMarkdown(name)}**! 🌟`,
  welcomeBody: [
    '🎯 **Simple Quiz Bot** ⚡',
    '',
    '✨ Create MCQ quizzes instantly!',
    '',
    '💡 **Rules:**',
    '• `q` = question, `o` = options, `c` = correct, `e` = explanation',
    '• `c` starts from 0 (0=A, 1=B, 2=C, 3=D)',
    '• 2-4 options allowed per question',
    '• Keep short to fit Telegram limits',
  ].join('\n'),
  jsonTemplate: JSON_TEMPLATE,
  styleChoice: [
    '🎭 **Choose Your Quiz Style:**',
    '',
    '🔒 **Anonymous Quiz:**',
    '✅ Can forward to channels and groups',
    '✅ Voters remain private',
    '',
    '👤 **Non-Anonymous Quiz:**',
    '✅ Shows who answered each question',
    '❌ Cannot be forwarded to channels',
    '',
    '**Which style do you prefer?** 👇',
  ].join('\n'),
  styleButtons: [
    [{ text: '🔒 Anonymous Quiz (Can forward to channels)', callbackData: CALLBACK_ANONYMOUS }],
    [{ text: '👤 Non-Anonymous Quiz (Shows who voted)', callbackData: CALLBACK_ATTRIBUTED }],
  ],
  toggleButtons: [
    [{ text: '🔒 Switch to Anonymous', callbackData: CALLBACK_ANONYMOUS }],
    [{ text: '👤 Switch to Non-Anonymous', callbackData: CALLBACK_ATTRIBUTED }],
  ],
  preferenceSelected: (anonymous: boolean): string =>
    `✅ **${quizStyleLabel(anonymous)} Quiz Selected!** 🎉\n\n⏭️ **Next:** JSON template coming... ⚡`,
  payloadInstructions: (anonymous: boolean): string => [
    `✅ **${quizStyleLabel(anonymous)} Quiz Selected!** 🎉`,
    '',
    '📝 **Next Steps:**',
    '1️⃣ Copy the above JSON template',
    '2️⃣ Give it to an AI assistant 🤖',
    '3️⃣ Ask it to fill in your questions in the same format',
    '',
    '🚀 **Then send me your customized JSON:** 👇',
  ].join('\n'),
  processing: '🔄 **Processing your quiz JSON...** ⚡',
  validated: (count: number, anonymous: boolean): string =>
    `✅ **${count} questions validated!** 🎯\n🚀 Sending ${anonymous ? 'anonymous' : 'non-anonymous'} polls...`,
  decodeError: '❌ Invalid JSON format! 📋\n\n🔄 Let\'s restart with the proper format...',
  validationError: (detail: string): string => `❌ ${detail}\n\n🔄 Restarting...`,
  completed: (count: number, anonymous: boolean): string =>
    `🎯 **${count} ${quizStyleLabel(anonymous)} quizzes sent successfully!** ✅🎉`,
  partial: (sent: number, total: number): string =>
    `⚠️ **Partial Success:** ${sent}/${total} questions sent 📊\n\n🔄 **Restarting...**`,
  restartHeader: '🎉 **Ready for another quiz?** ✨',
  redirect: '🔄 **Let\'s start properly!** ✨',
  genericError: '❌ **Error occurred!** ⚠️\n\n🔄 **Restarting...**',
  rateLimited: (retryAfterSec: number): string =>
    `⏳ Too many requests. Please wait ${retryAfterSec}s before trying again.`,
  help: [
    '🆘 **Quiz Bot Help** 📚',
    '',
    '🤖 **Commands:**',
    '• /start - Begin quiz creation',
    '• /quickstart - Quick 5-step guide',
    '• /template - Get JSON template',
    '• /help - Show this help',
    '• /status - Check settings',
    '• /toggle - Switch quiz types',
    '',
    '📚 **JSON Format:**',
    '• `all_q` - Questions array',
    '• `q` - Question text',
    '• `o` - Answer options (2-4 choices)',
    '• `c` - Correct answer (0=A, 1=B, 2=C, 3=D)',
    '• `e` - Explanation (optional)',
  ].join('\n'),
  quickstart: [
    '⚡ **Quick Start Guide:** 🚀',
    '',
    '1️⃣ Use /template to get the JSON format 📋',
    '2️⃣ Give the template to an AI assistant 🤖',
    '3️⃣ Ask it to fill in your questions in this format 💭',
    '4️⃣ Send the customized JSON to me 📤',
    '5️⃣ Get instant interactive quizzes! 🎯',
  ].join('\n'),
  templateHeader: '📋 **4-Option JSON Template:** 🎯',
  templateHint: '💡 **Copy the template above, fill in your questions and send it back!** ✨',
  status: ({ name, chatId, anonymous, activeUsers }): string => [
    `${anonymous ? '🟢' : '🔵'} **Bot Status: Active & Ready!** ⚡`,
    '',
    `👤 **User:** ${escapeMarkdown(name)}`,
    `📍 **Chat ID:** \`${chatId}\``,
    `🎯 **Quiz Type:** ${quizStyleLabel(anonymous)}`,
    anonymous ? '🔐 Perfect for channels & forwarding' : '👁️ Shows voter participation',
    `📊 **Active Users:** ${activeUsers}`,
  ].join('\n'),
  toggle: (anonymous: boolean): string =>
    `⚙️ **Current Setting:** ${quizStyleLabel(anonymous)} 📊\n\n🔄 **Quick Toggle:** Choose your preferred quiz type: 👇`,
};
