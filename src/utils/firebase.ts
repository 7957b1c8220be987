import * as admin from 'firebase-admin';

/**
 * Firebase Admin 初期化（Firestore 履歴 / Cloud Storage ログで共有）
 * GCP_SERVICE_ACCOUNT_JSON があればサービスアカウントで、なければ
 * Application Default Credentials で初期化する
 */
export function getFirebaseApp(): admin.app.App {
  if (admin.apps.length) {
    return admin.app();
  }

  const credentialsJson = process.env.GCP_SERVICE_ACCOUNT_JSON;
  if (credentialsJson) {
    const serviceAccount = parseServiceAccount(credentialsJson);
    return admin.initializeApp({
      credential: admin.credential.cert(serviceAccount),
      projectId: process.env.FIREBASE_PROJECT_ID || serviceAccount.projectId,
    });
  }

  return admin.initializeApp({
    projectId: process.env.FIREBASE_PROJECT_ID,
  });
}

/**
 * サービスアカウントの JSON（snake_case）を firebase-admin の ServiceAccount に変換
 */
export function parseServiceAccount(json: string): admin.ServiceAccount {
  let parsed: unknown;
  try {
    parsed = JSON.parse(json);
  } catch (error) {
    throw new Error(`GCP_SERVICE_ACCOUNT_JSON を解析できません: ${error}`);
  }

  if (typeof parsed !== 'object' || parsed === null) {
    throw new Error('GCP_SERVICE_ACCOUNT_JSON はオブジェクトである必要があります');
  }

  const projectId = readString(parsed, 'project_id');
  const clientEmail = readString(parsed, 'client_email');
  const privateKey = readString(parsed, 'private_key');

  if (!clientEmail || !privateKey) {
    throw new Error('GCP_SERVICE_ACCOUNT_JSON に client_email / private_key がありません');
  }

  return { projectId, clientEmail, privateKey };
}

function readString(source: object, key: string): string | undefined {
  const value: unknown = Reflect.get(source, key);
  return typeof value === 'string' ? value : undefined;
}
