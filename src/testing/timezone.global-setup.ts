/**
 * Runs the suite east of UTC (UTC+05:30), where workbook dates are most easily shifted a day.
 */
export default function globalSetup(): void {
  process.env.TZ = 'Asia/Kolkata';
}
