import type { Request, Response } from '@google-cloud/functions-framework';
import { createPipelineDeps, runPipeline } from './pipeline';
import { errorMessage } from './utils/errors';
import { logger } from './utils/logger';

/**
 * Google Cloud Functions Gen2 エントリーポイント
 * Cloud Scheduler から毎時呼び出す
 * ?force=true で配信時間帯外でも実行
 */
export const politicsNewsHourly = async (req: Request, res: Response) => {
  res.set('Access-Control-Allow-Origin', '*');

  if (req.method === 'OPTIONS') {
    res.set('Access-Control-Allow-Methods', 'GET, POST');
    res.set('Access-Control-Allow-Headers', 'Content-Type');
    res.status(204).send('');
    return;
  }

  try {
    const result = await runPipeline(createPipelineDeps(), {
      force: req.query.force === 'true'
    });

    res.status(result.status === 'failed' ? 500 : 200).json({
      success: result.status !== 'failed',
      ...result
    });

  } catch (error) {
    // 依存関係の初期化失敗（環境変数未設定など）
    logger.error(`初期化中にエラーが発生: ${errorMessage(error)}`);

    res.status(500).json({
      success: false,
      error: errorMessage(error)
    });
  }
};
