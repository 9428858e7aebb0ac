import { S3Client, PutObjectCommand } from "@aws-sdk/client-s3";
import { env } from "./config";
import { OutputFile } from "./output";

let s3Client: S3Client | null = null;

function getClient(): S3Client {
  if (s3Client) return s3Client;

  // Credentials come from AWS_PROFILE or the default provider chain
  s3Client = new S3Client({ region: env.AWS_REGION });
  return s3Client;
}

export async function uploadToS3(bucket: string, key: string, body: string | Buffer, contentType: string = "text/plain") {
  try {
    const client = getClient();
    const command = new PutObjectCommand({
      Bucket: bucket,
      Key: key,
      Body: body,
      ContentType: contentType,
    });
    await client.send(command);
    console.log(`Successfully uploaded ${key} to ${bucket}`);
  } catch (error) {
    console.error(`Error uploading to S3: ${error}`);
    throw error;
  }
}

/**
 * Upload rendered output under "<prefix>/<file path>". Returns the keys written.
 */
export async function uploadOutputFiles(bucket: string, prefix: string, files: OutputFile[]): Promise<string[]> {
  const keys: string[] = [];
  for (const file of files) {
    const key = prefix ? `${prefix}/${file.path}` : file.path;
    await uploadToS3(bucket, key, file.body, `${file.contentType}; charset=utf-8`);
    keys.push(key);
  }
  return keys;
}
