/** KRX market holidays, keyed by ISO date. */
export const KRX_HOLIDAYS: Readonly<Record<string, string>> = {
  "2025-01-01": "New Year's Day",
  "2025-01-28": "Seollal holiday",
  "2025-01-29": "Seollal",
  "2025-01-30": "Seollal holiday",
  "2025-03-01": "Independence Movement Day",
  "2025-03-03": "Independence Movement Day (substitute)",
  "2025-05-01": "Labour Day",
  "2025-05-05": "Children's Day / Buddha's Birthday",
  "2025-05-06": "Substitute holiday",
  "2025-06-03": "Memorial Day",
  "2025-08-15": "Liberation Day",
  "2025-09-16": "Chuseok holiday",
  "2025-09-17": "Chuseok",
  "2025-09-18": "Chuseok holiday",
  "2025-10-03": "National Foundation Day",
  "2025-10-08": "Chuseok (substitute)",
  "2025-10-09": "Hangul Day",
  "2025-12-25": "Christmas Day"
};
