import { NextRequest, NextResponse } from 'next/server'
import { analyzeUpload } from '@/lib/upload'
import { getAnalysisStore } from '@/lib/store'
import { loadConfig } from '@/lib/config'
import { consoleDiagnostics } from '@/lib/diagnostics'

export async function POST(request: NextRequest) {
  try {
    const config = loadConfig()
    const declaredLength = Number(request.headers.get('content-length') ?? 0)
    if (declaredLength > config.maxUploadBytes * 1.1) {
      return NextResponse.json({ error: 'Upload is too large' }, { status: 413 })
    }

    const formData = await request.formData()
    const entry = formData.get('file')
    const file = entry instanceof File ? entry : null

    const { status, body } = await analyzeUpload(file, {
      store: getAnalysisStore(),
      config,
      diagnostics: consoleDiagnostics,
    })
    return NextResponse.json(body, { status })
  } catch (error) {
    console.error('[UPLOAD]', error)
    return NextResponse.json({ error: 'File analysis failed' }, { status: 500 })
  }
}
