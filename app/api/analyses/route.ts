import { NextRequest, NextResponse } from 'next/server'
import { getAnalysisStore } from '@/lib/store'

export async function GET(request: NextRequest) {
  try {
    const limitParam = Number(request.nextUrl.searchParams.get('limit') ?? 50)
    const limit = Number.isInteger(limitParam) && limitParam > 0 ? Math.min(limitParam, 200) : 50
    const analyses = getAnalysisStore().list(limit)
    return NextResponse.json({ data: analyses })
  } catch (error) {
    console.error('[ANALYSES]', error)
    return NextResponse.json({ error: 'Could not load analysis history' }, { status: 500 })
  }
}
