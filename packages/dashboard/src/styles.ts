export const DASHBOARD_STYLES = `
body { font-family: -apple-system, "Segoe UI", Roboto, sans-serif; margin: 0; background: #f4f6f9; color: #1f2933; }
header { background: #12263a; color: #fff; padding: 24px 32px; }
header h1 { margin: 0 0 4px; font-size: 24px; }
header .updated { margin: 0; opacity: 0.8; font-size: 13px; }
main { padding: 24px 32px; }
.cards { display: grid; grid-template-columns: repeat(auto-fit, minmax(160px, 1fr)); gap: 16px; margin-bottom: 24px; }
.card { background: #fff; border-radius: 8px; padding: 16px; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
.card .label { font-size: 12px; text-transform: uppercase; color: #616e7c; }
.card .value { font-size: 22px; font-weight: 600; margin-top: 6px; }
.card .sub { font-size: 12px; color: #616e7c; margin-top: 4px; }
section { background: #fff; border-radius: 8px; padding: 16px 20px; margin-bottom: 24px; box-shadow: 0 1px 3px rgba(0,0,0,0.08); }
section h2 { font-size: 18px; margin-top: 0; }
.badge { font-size: 11px; padding: 2px 8px; border-radius: 10px; background: #e4e7eb; color: #3e4c59; margin-left: 8px; vertical-align: middle; }
table { width: 100%; border-collapse: collapse; font-size: 13px; }
th, td { padding: 8px; border-bottom: 1px solid #e4e7eb; text-align: left; vertical-align: top; }
th { background: #f5f7fa; font-weight: 600; }
td.num { text-align: right; white-space: nowrap; }
.up { color: #0f8a4f; }
.down { color: #c62828; }
.flat { color: #616e7c; }
.na { color: #9aa5b1; cursor: help; }
tr.failed td { background: #fff8e1; }
tr.oversold td.rsi { color: #0f8a4f; font-weight: 600; }
tr.overbought td.rsi { color: #c62828; font-weight: 600; }
ul.insights { margin: 0; padding-left: 16px; }
.ai-note { font-size: 12px; color: #3e4c59; max-width: 280px; }
`;
