// Button captions. Inbound text is matched against these exactly, once, in events.ts.
export const LABELS = {
  russian: "Русский",
  rules: "Правила игры",
  about: "О боте",
  accept: "Принять",
  startGame: "Начать игру",
  faq: "Ответы на вопросы",
  next: "Далее",
  nextLevel: "Далее, перейти к следующему уровню.",
  nextLevelShort: "Следующий уровень",
  levelRules: "Правила уровня",
  time: "Время",
  referral: "Пригласи друга",
  donation: "Донат",
  startTask: "Начать задание",
  taskDone: "Задание выполнено",
  checkStatus: "Проверить статус",
  checkCharity: "Проверить статус пожертвования",
  charity: "Благотворительность",
  community: "Ссылка на сообщество",
  communityMenu: "Сообщество «Создатели»",
  back: "Назад",
  pay: "Оплатить",
  join: "Присоединиться к сообществу"
} as const;

export function levelButton(level: number): string {
  return `${level} уровень`;
}
