import 'dotenv/config';
import { parseArgs } from './cli-options';
import { createPipelineDeps, runPipeline } from './pipeline';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

/**
 * GitHub Actions の cron（毎時）から実行する CLI
 */
async function main(): Promise<void> {
  const options = parseArgs(process.argv.slice(2));

  if (options.force) {
    console.log('⚠️  配信時間帯チェックを無視します (--force)');
  }
  if (options.dryRun) {
    console.log('⚠️  dry-run モード: 投稿・履歴保存・ログ追記を行いません');
  }

  const result = await runPipeline(createPipelineDeps(), options);

  console.log(`\n結果: ${result.status} - ${result.message}`);
  console.log(`取得 ${result.fetched}件 / 候補 ${result.candidates}件 / 判定 ${result.scored}件 / 投稿 ${result.posted}件\n`);

  if (result.status === 'failed') {
    process.exitCode = 1;
  }
}

main().catch(error => {
  logger.error(`実行中にエラーが発生: ${errorMessage(error)}`);
  process.exit(1);
});
