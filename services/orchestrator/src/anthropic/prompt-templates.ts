/**
 * Prompt Template Builder
 * Prompts for retrieval-query rewriting, candidate reranking and consultation answers
 */

import type { ConversationMessage, EvidenceItem } from '@medrag/shared-types';
import { isInternalOrigin } from '@medrag/shared-types';

/**
 * Label prefixed to a model's rewritten query, stripped when parsing
 */
export const REWRITE_ANSWER_LABEL = '改写后的检索用问句：';

function formatHistory(history: ConversationMessage[], userLabel: string, assistantLabel: string): string[] {
  const lines: string[] = [];
  for (const msg of history) {
    const content = msg.content.trim();
    if (!content) continue;
    lines.push(`${msg.role === 'user' ? userLabel : assistantLabel}：${content}`);
  }
  return lines;
}

/**
 * Rewrite a user question into one retrieval-oriented line.
 * `history` is expected to be the already-windowed recent turns.
 */
export function buildRewritePrompt(question: string, history: ConversationMessage[]): string {
  const historyLines = formatHistory(history, 'user', 'assistant');
  const historyBlock = historyLines.length > 0 ? `最近对话：\n${historyLines.join('\n')}\n\n` : '';

  return `你是一个医疗问诊检索助手。请把用户的提问改写成一句只包含医学关键信息的检索用问句，用于在医疗知识库中检索。

要求：
1. 保留症状、部位、药物、疾病、检查等医学相关信息；
2. 若有指代（如「这个药」「上面的症状」），结合最近对话替换为具体内容；
3. 去掉礼貌用语、语气词和无关的描述；
4. 只输出一行改写后的问句，不要解释，不要加引号或前缀。

${historyBlock}用户当前问题：${question}

${REWRITE_ANSWER_LABEL}`;
}

/**
 * Ask for the indices of the most relevant candidates, comma-separated
 */
export function buildRerankPrompt(query: string, previews: string[], topK: number): string {
  const candidates = previews.map((preview, i) => `[${i}] ${preview}`).join('\n\n');

  return `你是一个医疗问诊助手。用户问题是：${query}

以下是候选知识片段：
${candidates}

请根据与用户问题的相关性排序，返回最相关的${topK}个片段的序号，用逗号分隔。
只返回序号，不要其他内容。例如：0,3,5`;
}

export const CONSULT_SYSTEM_PROMPT = `你是一个专业的医疗问诊助手，具备丰富的医学知识。你的任务是：

1. 理解病情：仔细分析用户的症状描述
2. 信息补全：信息不完整时，主动询问症状持续时间、严重程度、伴随症状等关键信息
3. 知识运用：基于提供的参考知识给出专业建议
4. 结构化建议：给出清晰的分条建议

回答要求：
- 专业、准确、易懂
- 引用参考知识时标注【知识库】或【联网搜索】
- 给出3-5条编号的结构化建议
- 必要时提醒用户及时就医

重要提示：
- 你不能替代专业医生的诊断
- 紧急情况请立即就医
- 建议仅供参考`;

/**
 * User turn for answer generation. Uses the raw question, never the retrieval query.
 */
export function buildConsultUserPrompt(
  question: string,
  evidence: EvidenceItem[],
  history: ConversationMessage[]
): string {
  const knowledge = evidence
    .map((item, i) => {
      const label = isInternalOrigin(item.origin) ? '【知识库】' : '【联网搜索】';
      return `${label} 来源${i + 1}：\n${item.content}`;
    })
    .join('\n\n');

  const historyLines = formatHistory(history, '用户', '助手');
  const historyBlock = historyLines.length > 0 ? `历史对话：\n${historyLines.join('\n')}\n\n` : '';

  return `${historyBlock}用户问题：${question}

参考知识：
${knowledge || '（暂无可用的参考知识）'}

请基于以上知识给出专业的问诊建议。`;
}
