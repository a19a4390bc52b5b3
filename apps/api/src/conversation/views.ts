import { MAX_LEVEL, USER_ERROR_MESSAGE, reply, type AdminStats, type OutboundMessage, type Reply } from "@awaken/shared";
import type { LevelScreen } from "../services/progression.js";
import type { ReferralStatus } from "../services/referrals.js";
import { formatMoscowTime, formatRemaining, formatRub } from "./format.js";
import { LABELS, levelButton } from "./labels.js";

const BACK_ROW = [LABELS.back];

export function errorReply(): Reply {
  return reply({ text: USER_ERROR_MESSAGE });
}

export function useButtonsReply(): Reply {
  return reply({ text: "Пожалуйста, используйте кнопки меню." });
}

export function languagePrompt(): Reply {
  return reply({ text: "Выберите язык:", keyboard: [[LABELS.russian]] });
}

export function languageRetry(): Reply {
  return reply({ text: "Пожалуйста, выберите язык из предложенных вариантов.", keyboard: [[LABELS.russian]] });
}

function mainMenuKeyboard(registered: boolean): string[][] {
  const rows: string[][] = [[LABELS.rules], [LABELS.about], [LABELS.communityMenu]];
  if (registered) rows.unshift([LABELS.startGame]);
  return rows;
}

export function mainMenu(registered: boolean, text = "🏠 Главное меню"): Reply {
  return reply({ text, keyboard: mainMenuKeyboard(registered) });
}

export function welcome(): Reply {
  return mainMenu(false, "Добро пожаловать в бота «Пробуждение»!");
}

export function rulesScreen(registered: boolean): Reply {
  return reply({
    text:
      "Правила игры:\n\n" +
      "Совершать одно доброе дело в течение 21-го повторения (задания), чтобы закрепить привычку делать добро. " +
      "После каждого выполненного задания открывается следующий уровень.",
    keyboard: [[registered ? LABELS.startGame : LABELS.accept], BACK_ROW]
  });
}

export function aboutScreen(communityUrl: string | undefined): Reply {
  const msg: OutboundMessage = {
    text:
      "Телеграм-бот предназначен для духовного сообщества «Создатели», цель которого – улучшить качество жизни " +
      "каждого отдельного человека и сделать мир лучше."
  };
  if (communityUrl) msg.links = [{ text: LABELS.communityMenu, url: communityUrl }];
  return reply(msg);
}

export function communityScreen(communityUrl: string | undefined): Reply {
  if (!communityUrl) return reply({ text: "Ссылка на сообщество скоро появится.", keyboard: [BACK_ROW] });
  return reply(
    {
      text: "Добро пожаловать в наше закрытое сообщество «Создатели»! Присоединяйтесь по ссылке ниже:",
      links: [{ text: LABELS.join, url: communityUrl }]
    },
    { text: "После вступления вы можете вернуться в меню.", keyboard: [BACK_ROW] }
  );
}

export function registrationStart(): Reply {
  return reply(
    { text: "Спасибо за принятие правил! Давайте начнем регистрацию.", keyboard: [] },
    { text: "Введите ваше имя:" }
  );
}

export const registrationPrompts = {
  nameRetry: "Данные некорректны. Введите ваше реальное имя:",
  birthdate: "Введите дату рождения (в формате ДД.ММ.ГГГГ):",
  birthdateRetry: "Введите корректную дату (формат ДД.ММ.ГГГГ):",
  location: "Введите место проживания:",
  locationRetry: "Введите корректное место проживания:"
} as const;

export function registrationDone(): Reply {
  return reply({ text: "Регистрация завершена!", keyboard: [[LABELS.startGame]] });
}

function levelKeyboard(screen: LevelScreen): string[][] {
  const { level, currentLevel } = screen;
  if (level === 1) return [[LABELS.faq, LABELS.next]];
  const rows: string[][] = [];
  const nav = [levelButton(level - 1)];
  if (level < currentLevel) nav.push(levelButton(level + 1));
  rows.push(nav);
  rows.push([level >= MAX_LEVEL ? LABELS.next : LABELS.nextLevel]);
  rows.push([LABELS.levelRules]);
  return rows;
}

export function levelScreen(screen: LevelScreen, ...extra: OutboundMessage[]): Reply {
  return reply(
    {
      text: screen.content ?? "Контент для этого уровня пока недоступен.",
      keyboard: levelKeyboard(screen),
      level_image: screen.level
    },
    ...extra
  );
}

export function levelRulesScreen(rules: string | null): Reply {
  return reply({
    text:
      rules ??
      "Правила платных уровней:\n\nНадо делать добрые дела либо платить за их неисполнение деньгами, тем самым соблюдается баланс.",
    keyboard: [BACK_ROW]
  });
}

export function faqScreen(): Reply {
  return reply({
    text:
      "Часто задаваемые вопросы:\n\n" +
      "1. Как открыть следующий уровень?\nВыполните любое из заданий: время, приглашение друга или донат.\n\n" +
      "2. Можно ли вернуться к пройденным уровням?\nДа, кнопками с номерами уровней.\n\n" +
      "3. Сколько всего уровней?\n21.",
    keyboard: [BACK_ROW]
  });
}

const FINAL_KEYBOARD = [[LABELS.community, LABELS.charity], [levelButton(MAX_LEVEL)]];

export function finalScreen(): Reply {
  return reply({
    text:
      "🎉 Поздравляем! Вы прошли все 21 уровень бота «Пробуждение»!\n\n" +
      "Теперь вы можете:\n" +
      "1. Присоединиться к нашему закрытому сообществу\n" +
      "2. Поддержать проект благотворительным взносом\n\n" +
      "Спасибо за ваше участие!",
    keyboard: FINAL_KEYBOARD
  });
}

export function taskSelection(level: number): Reply {
  return reply({
    text:
      `Чтобы открыть уровень ${level + 1}, выполните любое из заданий: ` +
      "отдайте время, пригласите друга или сделайте донат.",
    keyboard: [[LABELS.time, LABELS.referral, LABELS.donation], [LABELS.nextLevelShort], BACK_ROW]
  });
}

export function timeTaskIntro(view: { active: boolean; endsAt: string | null; remainingMs: number }): Reply {
  if (view.active && view.endsAt) {
    return reply({
      text:
        `Задание уже начато. Осталось: ${formatRemaining(view.remainingMs)}.\n\n` +
        `Завершится: ${formatMoscowTime(view.endsAt)}`,
      keyboard: [[LABELS.taskDone], BACK_ROW]
    });
  }
  return reply({
    text: "Задание на практику:\n\nВыполняйте доброе дело или практику в течение 24 часов.\n\nНачать задание?",
    keyboard: [[LABELS.startTask, LABELS.back]]
  });
}

export function timeTaskStarted(endsAt: string, remainingMs: number, fresh: boolean): Reply {
  return reply({
    text:
      (fresh ? "Задание начато!\n\n" : "Задание уже идёт.\n\n") +
      `Осталось: ${formatRemaining(remainingMs)}.\n` +
      `Завершится: ${formatMoscowTime(endsAt)}`,
    keyboard: [[LABELS.taskDone], BACK_ROW]
  });
}

export function timeTaskTooEarly(remainingMs: number): Reply {
  return reply({
    text: `Время на выполнение задания ещё не вышло! Осталось: ${formatRemaining(remainingMs)}.`,
    keyboard: [[LABELS.taskDone], BACK_ROW]
  });
}

export function noActiveTask(): Reply {
  return reply({ text: "У вас нет активных заданий.", keyboard: [[LABELS.startTask], BACK_ROW] });
}

export function taskAlreadyDone(): Reply {
  return reply({ text: "Задание для этого уровня уже выполнено. Нажмите «Далее».", keyboard: [[LABELS.nextLevelShort], BACK_ROW] });
}

export function unlocked(screen: LevelScreen, note: string): Reply {
  return levelScreen(screen, { text: `✅ ${note} Открыт ${screen.level} уровень.` });
}

export function referralIntro(link: string, status: ReferralStatus): Reply {
  return reply({
    text:
      `Пригласите друга в игру по этой ссылке:\n\n${link}\n\n` +
      "После того как друг пройдёт регистрацию, откроется следующий уровень.\n" +
      `Приглашено: ${status.total}, зарегистрировались: ${status.completed}.`,
    keyboard: [[LABELS.checkStatus], BACK_ROW]
  });
}

export function referralPending(status: ReferralStatus): Reply {
  return reply({
    text:
      "❌ Ваш друг ещё не зарегистрировался.\n" +
      `Всего приглашено: ${status.total}\n` +
      "Продолжайте приглашать друзей!",
    keyboard: [[LABELS.checkStatus], BACK_ROW]
  });
}

export function donationCheckout(checkoutUrl: string, amount: number, targetLevel: number): Reply {
  return reply(
    {
      text: `Для перехода на уровень ${targetLevel} сделайте донат ${formatRub(amount)} ₽:`,
      links: [{ text: LABELS.pay, url: checkoutUrl }]
    },
    { text: "После оплаты нажмите «Проверить статус».", keyboard: [[LABELS.checkStatus], BACK_ROW] }
  );
}

export function donationNotFound(): Reply {
  return reply({ text: "❌ Донат не найден. Пожалуйста, создайте новый платеж.", keyboard: [[LABELS.donation], BACK_ROW] });
}

export function paymentUnpaid(status: string, retryLabel: string): Reply {
  if (status === "canceled") {
    return reply({ text: "❌ Платеж отменён. Можно создать новый.", keyboard: [BACK_ROW] });
  }
  return reply({ text: "⏳ Платеж ещё не подтвержден. Попробуйте проверить чуть позже.", keyboard: [[retryLabel], BACK_ROW] });
}

export function paymentUnavailable(retryLabel: string): Reply {
  return reply({ text: "⚠️ Не удалось проверить статус платежа. Попробуйте позже.", keyboard: [[retryLabel], BACK_ROW] });
}

export function charityPrompt(): Reply {
  return reply({ text: "Введите сумму благотворительного пожертвования (в рублях):", keyboard: [BACK_ROW] });
}

const CHARITY_AMOUNT_ERRORS: Record<string, string> = {
  not_a_number: "Пожалуйста, введите корректную сумму",
  too_small: "Минимальная сумма - 1 рубль",
  too_large: "Максимальная сумма - 1 000 000 рублей"
};

export function charityAmountRetry(reason: string | undefined): Reply {
  return reply({ text: CHARITY_AMOUNT_ERRORS[reason ?? ""] ?? CHARITY_AMOUNT_ERRORS.not_a_number, keyboard: [BACK_ROW] });
}

export function charityCheckout(checkoutUrl: string, amount: number): Reply {
  return reply(
    {
      text: `Сумма пожертвования: ${formatRub(amount)} руб.\nНажмите кнопку ниже для оплаты:`,
      links: [{ text: LABELS.pay, url: checkoutUrl }]
    },
    { text: "После оплаты нажмите «Проверить статус пожертвования».", keyboard: [[LABELS.checkCharity], BACK_ROW] }
  );
}

export function charityNotFound(): Reply {
  return reply({ text: "Пожертвование не найдено", keyboard: [BACK_ROW] });
}

export function charityThanks(exit: "main_menu" | "final_level", registered: boolean): Reply {
  const thanks = "✅ Пожертвование успешно получено! Спасибо за вашу поддержку!";
  if (exit === "final_level") return reply({ text: thanks, keyboard: FINAL_KEYBOARD });
  return mainMenu(registered, thanks);
}

export function adminForbidden(): Reply {
  return reply({ text: "⛔ У вас нет прав администратора" });
}

export function adminStatsText(stats: AdminStats): string {
  const lines = [
    "📊 Статистика бота:",
    "",
    `👥 Активных пользователей: ${stats.active_users}`,
    `🔄 Выполнено добрых дел: ${stats.completed_good_deeds}`,
    "",
    "📈 Статистика по уровням:"
  ];
  for (const row of stats.levels) lines.push(`  • Уровень ${row.level}: ${row.users} чел.`);
  lines.push(
    "",
    `💸 Донаты: ${stats.donations.total_count} на сумму ${stats.donations.total_amount.toFixed(2)} руб.`,
    "",
    "👥 Рефералы:",
    `  • Всего приглашено: ${stats.referrals.total}`,
    `  • Зарегистрировано: ${stats.referrals.completed}`,
    `  • В процессе: ${stats.referrals.pending}`
  );
  return lines.join("\n");
}
