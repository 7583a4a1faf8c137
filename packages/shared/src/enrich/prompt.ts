// Prompt prefix sent to Gemini; the article URL is appended verbatim.
// The block builder expects blank-line separated sections whose first line is
// the heading, followed by one final paragraph of hashtags.

export const DEFAULT_SUMMARY_MARKER = "*研究の概要*";

export const DEFAULT_SUMMARY_PROMPT = `以下のURLの論文を読み、日本語で要約してください。
出力は次の形式に厳密に従い、前置きや補足は書かないでください。
各セクションは空行1行で区切り、見出しは1行目にそのまま書いてください。

${DEFAULT_SUMMARY_MARKER}
研究の目的と背景を2〜3文で。

*提案手法*
手法の要点を箇条書きで3点以内。

*結果*
主要な実験結果を数値とともに2〜3文で。

*新規性*
既存研究との違いを1〜2文で。

#キーワード1 #キーワード2 #キーワード3

URL: `;
