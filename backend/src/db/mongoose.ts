import mongoose from 'mongoose';

let connected = false;

export async function connectMongo(uri: string): Promise<void> {
  if (connected) return;
  await mongoose.connect(uri, { serverSelectionTimeoutMS: 5000 });
  connected = true;
  console.log('[Mongo] Connected');
}

export function isMongoConnected(): boolean {
  return connected && mongoose.connection.readyState === 1;
}

export async function disconnectMongo(): Promise<void> {
  if (!connected) return;
  await mongoose.disconnect();
  connected = false;
  console.log('[Mongo] Disconnected');
}
